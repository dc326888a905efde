import type { ConfigurationStore, HandleAttacher } from '../../types/association';
import type { HandleService } from '../../types/handle';

/**
 * Collaborators every reconciliation step works against
 */
export interface ReconcilerDeps {
  handles: HandleService;
  associations: ConfigurationStore;
  attacher: HandleAttacher;
}
