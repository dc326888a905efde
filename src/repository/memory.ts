import type { Datastream, RepositoryObject } from '../types/repository';

/**
 * Datastream held in memory
 */
export class InMemoryDatastream implements Datastream {
  constructor(
    public readonly id: string,
    private content: string
  ) {}

  async getContent(): Promise<string> {
    return this.content;
  }

  async setContent(content: string): Promise<void> {
    this.content = content;
  }
}

/**
 * Repository object held in memory
 *
 * Used to embed the reconciler where objects are already loaded, and as the
 * object model in tests.
 *
 * @example
 * const object = new InMemoryRepositoryObject('islandora:1', ['islandora:sp_basic_image'], {
 *   DC: dcXml,
 *   OBJ: '<image/>',
 * });
 */
export class InMemoryRepositoryObject implements RepositoryObject {
  readonly models: ReadonlySet<string>;
  private readonly datastreams = new Map<string, InMemoryDatastream>();

  constructor(
    public readonly id: string,
    models: Iterable<string> = [],
    datastreams: Record<string, string> = {}
  ) {
    this.models = new Set(models);
    for (const [dsid, content] of Object.entries(datastreams)) {
      this.addDatastream(dsid, content);
    }
  }

  has(dsid: string): boolean {
    return this.datastreams.has(dsid);
  }

  datastream(dsid: string): InMemoryDatastream | undefined {
    return this.datastreams.get(dsid);
  }

  /**
   * Add a datastream, replacing any with the same id
   */
  addDatastream(dsid: string, content: string): InMemoryDatastream {
    const datastream = new InMemoryDatastream(dsid, content);
    this.datastreams.set(dsid, datastream);
    return datastream;
  }

  purgeDatastream(dsid: string): boolean {
    return this.datastreams.delete(dsid);
  }
}
