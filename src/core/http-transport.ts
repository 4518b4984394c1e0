import type { ReadableStreamDefaultReader, ReadableStreamReadResult } from 'node:stream/web';
import type { DownloadProgressCallback } from '../types/release';
import { TransportError } from './errors';

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export interface HttpTransportOptions {
  userAgent: string;
  token?: string;
  /** Defaults to the global fetch */
  fetch?: FetchFn;
  /** Longest wait for response headers, and for each chunk of a body after that */
  timeoutMs?: number;
}

interface OpenResponse {
  response: Response;
  controller: AbortController;
}

export interface JsonResponse {
  status: number;
  body: unknown;
}

const DEFAULT_TIMEOUT_MS = 60_000;

/**
 * Byte transport over HTTP. Every network or status failure surfaces as a TransportError.
 */
export class HttpTransport {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: HttpTransportOptions) {
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  }

  /**
   * GET a JSON document. A 404 is returned to the caller instead of thrown,
   * since "no such resource" is an answer for the release index, not a transport failure.
   */
  async getJson(url: string): Promise<JsonResponse> {
    const opened = await this.request(url, { Accept: 'application/vnd.github+json' }, true);
    const { response } = opened;

    if (response.status === 404) {
      return { status: 404, body: null };
    }

    this.assertOk(url, response);
    const text = (await this.readBody(url, opened)).toString('utf-8');

    try {
      const body: unknown = JSON.parse(text);
      return { status: response.status, body };
    } catch (error) {
      throw new TransportError(
        `Invalid JSON from ${url}: ${error instanceof Error ? error.message : String(error)}`,
        url,
        response.status
      );
    }
  }

  async getText(url: string): Promise<string> {
    const data = await this.download(url);
    return data.toString('utf-8');
  }

  /**
   * Download a response body fully into memory.
   */
  async download(url: string, onProgress?: DownloadProgressCallback): Promise<Buffer> {
    const opened = await this.request(url, { Accept: 'application/octet-stream' }, false);
    this.assertOk(url, opened.response);
    return this.readBody(url, opened, onProgress);
  }

  private async readBody(url: string, { response, controller }: OpenResponse, onProgress?: DownloadProgressCallback): Promise<Buffer> {
    if (!response.body) {
      throw new TransportError(`No response body received from ${url}`, url, response.status);
    }

    const contentLength = response.headers.get('content-length');
    const totalBytes = contentLength ? parseInt(contentLength, 10) : null;

    const chunks: Uint8Array[] = [];
    let bytesDownloaded = 0;
    const reader: ReadableStreamDefaultReader<Uint8Array> = response.body.getReader();

    try {
      while (true) {
        const { done, value } = await this.readChunk(reader, controller);
        if (done) break;

        chunks.push(value);
        bytesDownloaded += value.byteLength;
        onProgress?.({ bytesDownloaded, totalBytes });
      }
    } catch (error) {
      throw new TransportError(
        `Failed to read download from ${url}: ${error instanceof Error ? error.message : String(error)}`,
        url
      );
    } finally {
      reader.releaseLock();
    }

    return Buffer.concat(chunks);
  }

  private get timeoutMs(): number {
    return this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * Read the next chunk, giving up when none arrives within the timeout.
   * A slow download that keeps receiving data is never cut off.
   */
  private readChunk(
    reader: ReadableStreamDefaultReader<Uint8Array>,
    controller: AbortController
  ): Promise<ReadableStreamReadResult<Uint8Array>> {
    const timeoutMs = this.timeoutMs;

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const error = new Error(`no data received for ${timeoutMs} ms`);
        controller.abort(error);
        reader.cancel(error).catch((cancelError: unknown) => {
          reject(cancelError);
        });
        reject(error);
      }, timeoutMs);

      reader.read().then(
        (result) => {
          clearTimeout(timer);
          resolve(result);
        },
        (error: unknown) => {
          clearTimeout(timer);
          reject(error);
        }
      );
    });
  }

  /**
   * The token only goes to API requests; asset downloads redirect to third-party storage.
   */
  private async request(
    url: string,
    headers: Record<string, string>,
    authenticate: boolean
  ): Promise<OpenResponse> {
    const requestHeaders: Record<string, string> = {
      ...headers,
      'User-Agent': this.options.userAgent,
    };
    if (authenticate && this.options.token) {
      requestHeaders['Authorization'] = `Bearer ${this.options.token}`;
    }

    const controller = new AbortController();
    const timeoutMs = this.timeoutMs;
    const timer = setTimeout(() => {
      controller.abort(new Error(`no response within ${timeoutMs} ms`));
    }, timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        headers: requestHeaders,
        redirect: 'follow',
        signal: controller.signal,
      });
      return { response, controller };
    } catch (error) {
      throw new TransportError(
        `Network error requesting ${url}: ${error instanceof Error ? error.message : String(error)}`,
        url
      );
    } finally {
      clearTimeout(timer);
    }
  }

  private assertOk(url: string, response: Response): void {
    if (response.ok) return;

    if (response.status === 403) {
      throw new TransportError(
        `Request to ${url} was refused (HTTP 403). GitHub may be rate limiting; set GITHUB_TOKEN or try again later.`,
        url,
        response.status
      );
    }

    throw new TransportError(
      `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''} from ${url}`,
      url,
      response.status
    );
  }
}
