import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import * as cheerio from 'cheerio';
import type { CatalogProvider, SetRecord } from '../types';

const DEFAULT_TIMEOUT_MS = 10_000;

/** An HTTP call to a remote catalog failed (network, status or payload shape). */
export class ProviderRequestError extends Error {
  constructor(
    readonly provider: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(`[${provider}] ${message}`, options);
    this.name = 'ProviderRequestError';
  }
}

/**
 * Abstract base class for remote catalog providers.
 *
 * Concrete providers implement searchSets() and fetchSet() on top of
 * request(), and own exactly one mapper from their raw payload to a
 * validated SetRecord. Raw payloads never leave the provider module.
 */
export abstract class BaseProvider implements CatalogProvider {
  abstract readonly name: string;

  protected readonly http: AxiosInstance;

  constructor(http: AxiosInstance) {
    this.http = http;
  }

  abstract searchSets(query: string): Promise<SetRecord[]>;

  abstract fetchSet(setId: string): Promise<SetRecord>;

  /**
   * GET `url` and return the parsed body. Every failure is rethrown as a
   * ProviderRequestError carrying the HTTP status when there was one.
   */
  protected async request(url: string, config?: AxiosRequestConfig): Promise<unknown> {
    try {
      const { data } = await this.http.get<unknown>(url, config);
      return data;
    } catch (err: unknown) {
      if (axios.isAxiosError(err)) {
        throw new ProviderRequestError(this.name, `GET ${url} failed: ${err.message}`, err.response?.status, {
          cause: err,
        });
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new ProviderRequestError(this.name, `GET ${url} failed: ${message}`, undefined, { cause: err });
    }
  }
}

/** Shared axios instance defaults for provider HTTP clients. */
export function createHttpClient(baseURL: string, headers: Record<string, string> = {}): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: DEFAULT_TIMEOUT_MS,
    headers: { 'User-Agent': 'BrickScout/1.0', Accept: 'application/json', ...headers },
  });
}

/**
 * Normalise a set number to its variant form: "75192" → "75192-1",
 * "10497-2" stays as is. Surrounding whitespace is dropped.
 */
export function normalizeSetNumber(setId: string): string {
  const trimmed = setId.trim();
  return /-\d+$/.test(trimmed) ? trimmed : `${trimmed}-1`;
}

/** Plain text of an HTML fragment, whitespace collapsed. */
export function stripHtml(html: string): string {
  if (!html) return '';
  return cheerio.load(html).root().text().replace(/\s+/g, ' ').trim();
}
