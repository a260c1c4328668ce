import axios, { AxiosInstance } from 'axios';
import { HarvestContext } from '../context.js';
import { CredentialBundle } from '../types/index.js';
import { TransportError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

/**
 * Fetches raw page content. Implementations throw TransportError and never retry.
 */
export interface PageFetcher {
  fetchPage(url: string, credentials: CredentialBundle): Promise<string>;
}

export function buildCookieHeader(credentials: CredentialBundle): string {
  return Object.entries(credentials)
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}

export class HttpPageFetcher implements PageFetcher {
  private client: AxiosInstance;
  private logger: Logger;

  constructor(ctx: HarvestContext, client?: AxiosInstance) {
    const { baseUrl, userAgent, requestTimeoutMs } = ctx.config.source;
    this.logger = ctx.logger;
    this.client =
      client ??
      axios.create({
        timeout: requestTimeoutMs,
        maxRedirects: 10,
        responseType: 'text',
        headers: {
          'User-Agent': userAgent,
          Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.8',
          'Cache-Control': 'no-cache',
          Pragma: 'no-cache',
          Referer: `${baseUrl}/`,
        },
      });
  }

  async fetchPage(url: string, credentials: CredentialBundle): Promise<string> {
    this.logger.debug('Fetching page', { url });

    try {
      const response = await this.client.get<string>(url, {
        headers: { Cookie: buildCookieHeader(credentials) },
      });

      const html = typeof response.data === 'string' ? response.data : String(response.data);
      this.logger.debug('Fetched page', { url, status: response.status, htmlLength: html.length });
      return html;
    } catch (error) {
      throw this.toTransportError(error, url);
    }
  }

  private toTransportError(error: unknown, url: string): TransportError {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      const message = status
        ? `Request failed with status ${status}`
        : `Request failed: ${error.code ?? error.message}`;
      return new TransportError(message, url, { status, cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(`Request failed: ${message}`, url, { cause: error });
  }
}
