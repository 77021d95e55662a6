import { AppError } from './AppError';

/**
 * No Data Error
 * Every requested asset came back empty; the run aborts instead of persisting nothing
 */
export class NoDataError extends AppError {
  public readonly assetIds: string[];

  constructor(assetIds: string[]) {
    super(`No price data returned for any of: ${assetIds.join(', ')}`, 'NO_DATA');
    this.assetIds = assetIds;
    Object.setPrototypeOf(this, NoDataError.prototype);
  }
}
