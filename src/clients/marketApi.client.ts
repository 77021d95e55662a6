import axios, { AxiosInstance } from 'axios';
import { env } from '@/config/env';
import { CLIENT_IDENTITY, FETCH_POLICY } from '@/config/etlRules';

export interface MarketApiClientOptions {
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
}

/**
 * Create the axios instance used for every upstream call
 *
 * `validateStatus` accepts every status so that RetryingFetcher, not axios,
 * decides which responses are transient and which are fatal.
 */
export function createMarketApiClient(options: MarketApiClientOptions = {}): AxiosInstance {
  const apiKey = options.apiKey ?? env.MARKET_API_KEY;

  return axios.create({
    baseURL: options.baseUrl ?? env.MARKET_API_BASE_URL,
    timeout: options.timeoutMs ?? FETCH_POLICY.REQUEST_TIMEOUT_MS,
    headers: {
      'User-Agent': CLIENT_IDENTITY.USER_AGENT,
      Accept: 'application/json',
      ...(apiKey ? { 'x-cg-pro-api-key': apiKey } : {}),
    },
    validateStatus: () => true,
  });
}
