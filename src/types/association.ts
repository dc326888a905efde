import { z } from 'zod';
import type { Message } from './messages';
import type { RepositoryObject } from './repository';

/**
 * Links a content model to the datastream that should carry a Handle,
 * and the transform that embeds the Handle into that datastream.
 */
export const AssociationSchema = z.object({
  contentModel: z.string().min(1),
  datastreamId: z.string().min(1),
  transform: z.string().min(1),
});

export type Association = z.infer<typeof AssociationSchema>;

export const AssociationListSchema = z.array(AssociationSchema);

/**
 * Read-only source of associations
 */
export interface ConfigurationStore {
  /**
   * Associations for every given content model, in model order and then
   * configuration order.
   */
  associationsFor(models: Iterable<string>): Promise<Association[]>;
}

export interface AttachResult {
  success: boolean;
  message: Message;
}

/**
 * Applies `transform` to a datastream so that it references the object's Handle
 */
export interface HandleAttacher {
  applyHandleToDatastream(
    object: RepositoryObject,
    dsid: string,
    transform: string
  ): Promise<AttachResult>;
}
