/**
 * Central export point for all models
 * Allows clean imports: import { PriceObservation, AssetMetadata } from '@/models'
 */

export * from './PriceObservation';
export * from './AssetMetadata';
export * from './MarketChart';
export * from './EtlRun';
