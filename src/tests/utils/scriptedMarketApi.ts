/**
 * Scripted Market API
 * An axios instance whose adapter answers from per-endpoint reply queues,
 * so fetch-layer tests never touch the network
 */

import { AxiosAdapter, AxiosError, AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { createMarketApiClient } from '@/clients/marketApi.client';

export type ScriptedReply = { status: number; data?: unknown } | { networkError: string };

export interface ScriptedMarketApi {
  client: AxiosInstance;
  requests: InternalAxiosRequestConfig[];
  /** Endpoints of the requests made so far, in order */
  endpoints(): string[];
}

/**
 * Build a client for the given reply queues, keyed by endpoint path
 * An endpoint with no replies left answers 404
 */
export function createScriptedMarketApi(
  routes: Record<string, ScriptedReply[]>
): ScriptedMarketApi {
  const queues = new Map(Object.entries(routes).map(([url, replies]) => [url, [...replies]]));
  const requests: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const reply = queues.get(config.url ?? '')?.shift() ?? {
      status: 404,
      data: { error: 'not scripted' },
    };

    if ('networkError' in reply) {
      throw new AxiosError(reply.networkError, reply.networkError, config);
    }

    return {
      data: reply.data,
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
      request: {},
    };
  };

  const client = createMarketApiClient({ baseUrl: 'http://market.test/api/v3', apiKey: '' });
  client.defaults.adapter = adapter;

  return {
    client,
    requests,
    endpoints: () => requests.map((request) => request.url ?? ''),
  };
}

/**
 * market_chart payload from (ISO timestamp, price) pairs
 */
export function chartPayload(points: Array<[string, number]>): { prices: Array<[number, number]> } {
  return { prices: points.map(([iso, price]) => [Date.parse(iso), price]) };
}
