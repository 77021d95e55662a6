import { AssetMetadata } from '@/models';

/**
 * Metadata Store Interface
 * Persistence of the asset metadata snapshot carried between runs
 */
export interface IMetadataStore {
  /**
   * Load the snapshot written by a previous run
   * @returns The snapshot, or null when none has been persisted yet
   */
  load(): Promise<AssetMetadata[] | null>;

  /**
   * Persist the snapshot for the next run
   * @param snapshot - Full merged snapshot (not a delta)
   */
  save(snapshot: AssetMetadata[]): Promise<void>;
}
