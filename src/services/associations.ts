import type { Association, ConfigurationStore } from '../types/association';

/**
 * Configuration store over a fixed list of associations
 * Associations are indexed by content model and keep their configured order
 */
export class StaticConfigurationStore implements ConfigurationStore {
  private readonly byModel = new Map<string, Association[]>();

  constructor(associations: Association[]) {
    for (const association of associations) {
      const list = this.byModel.get(association.contentModel) ?? [];
      const duplicate = list.some(
        (existing) =>
          existing.datastreamId === association.datastreamId &&
          existing.transform === association.transform
      );
      if (!duplicate) {
        list.push({ ...association });
        this.byModel.set(association.contentModel, list);
      }
    }
  }

  async associationsFor(models: Iterable<string>): Promise<Association[]> {
    const associations: Association[] = [];
    const seen = new Set<string>();

    for (const model of models) {
      // A model listed twice contributes once
      if (seen.has(model)) {
        continue;
      }
      seen.add(model);
      associations.push(...(this.byModel.get(model) ?? []));
    }

    return associations;
  }
}
