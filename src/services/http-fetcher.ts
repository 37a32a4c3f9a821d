/**
 * HTTP Fetcher
 *
 * Fetches standings pages with a browser-like header set. One axios
 * instance (with keep-alive agents) is owned for the process lifetime and
 * reused across calls. No retries here: the poll loop retries on its next
 * tick.
 */

import * as http from 'http';
import * as https from 'https';
import axios, { AxiosInstance, AxiosResponse, CreateAxiosDefaults } from 'axios';
import { TransportError } from '../models/errors';

/**
 * Total request timeout
 */
export const REQUEST_TIMEOUT_MS = 25_000;

/**
 * Length of the body excerpt carried by a TransportError
 */
const EXCERPT_LENGTH = 300;

export const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'Cache-Control': 'no-cache',
  Pragma: 'no-cache',
};

/**
 * Create the shared axios instance
 *
 * Responses are kept as raw text and never rejected on status; the fetcher
 * decides what a failure is.
 */
export function createHttpClient(overrides: CreateAxiosDefaults = {}): AxiosInstance {
  return axios.create({
    timeout: REQUEST_TIMEOUT_MS,
    headers: BROWSER_HEADERS,
    responseType: 'text',
    transformResponse: [(data: unknown) => data],
    validateStatus: () => true,
    httpAgent: new http.Agent({ keepAlive: true }),
    httpsAgent: new https.Agent({ keepAlive: true }),
    ...overrides,
  });
}

function bodyText(response: AxiosResponse<unknown>): string {
  const { data } = response;
  if (typeof data === 'string') {
    return data;
  }
  if (data === undefined || data === null) {
    return '';
  }
  return Buffer.isBuffer(data) ? data.toString('utf-8') : String(data);
}

export class HttpFetcher {
  constructor(private client: AxiosInstance = createHttpClient()) {}

  /**
   * GET a page and return its body
   *
   * @throws TransportError on network failure, timeout or status >= 400
   */
  async fetch(url: string): Promise<string> {
    let response: AxiosResponse<unknown>;

    try {
      response = await this.client.get<unknown>(url);
    } catch (error) {
      throw new TransportError(
        `Request failed for ${url}: ${error instanceof Error ? error.message : String(error)}`,
        url
      );
    }

    const body = bodyText(response);

    if (response.status >= 400) {
      throw new TransportError(
        `HTTP ${response.status} for ${url}`,
        url,
        response.status,
        body.substring(0, EXCERPT_LENGTH)
      );
    }

    return body;
  }
}
