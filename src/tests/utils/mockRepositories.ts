/**
 * In-memory stand-ins for the persistence interfaces
 */

import { AssetMetadata, PriceObservationWithMetrics } from '@/models';
import { IMetadataStore, IPriceDatasetRepository } from '@/repositories/interfaces';

export class InMemoryMetadataStore implements IMetadataStore {
  public saved: AssetMetadata[][] = [];

  constructor(private snapshot: AssetMetadata[] | null = null) {}

  async load(): Promise<AssetMetadata[] | null> {
    return this.snapshot ? this.snapshot.map((record) => ({ ...record })) : null;
  }

  async save(snapshot: AssetMetadata[]): Promise<void> {
    this.saved.push(snapshot);
    this.snapshot = snapshot.map((record) => ({ ...record }));
  }
}

export class InMemoryPriceDatasetRepository implements IPriceDatasetRepository {
  public rows: PriceObservationWithMetrics[] = [];
  public saveCalls = 0;

  async save(rows: PriceObservationWithMetrics[]): Promise<number> {
    this.saveCalls += 1;
    this.rows = [...rows];
    return rows.length;
  }
}

/**
 * Create a fully mocked MetadataStore
 * All methods are jest.fn() and can be configured with .mockResolvedValue()
 */
export function createMockMetadataStore(): jest.Mocked<IMetadataStore> {
  return {
    load: jest.fn(),
    save: jest.fn(),
  };
}

/**
 * Sleep double that resolves immediately and records the requested delays
 */
export function createSleepSpy(): jest.Mock<Promise<void>, [number]> {
  return jest.fn<Promise<void>, [number]>().mockResolvedValue(undefined);
}
