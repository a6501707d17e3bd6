import http from 'node:http';
import https from 'node:https';
import type { AxiosRequestConfig } from 'axios';
import type { ScanConfig } from '../schemas/config.js';

const DEFAULT_HEADERS: Record<string, string> = {
  'Accept': '*/*',
  'Accept-Language': 'en-US,en;q=0.5',
  'Accept-Encoding': 'gzip, deflate',
  'Connection': 'keep-alive',
  'Pragma': 'no-cache',
  'Cache-Control': 'no-cache',
};

const MAX_REDIRECTS = 5;

export type ProbeRequestOptions = Pick<
  ScanConfig,
  'headers' | 'userAgent' | 'rotateUserAgent' | 'verifyTls' | 'followRedirects' | 'timeoutMs' | 'threads' | 'maxThreads'
>;

/**
 * Connection and header policy shared by every probe of a scan:
 * keep-alive agents sized to the worker pool, TLS verification, User-Agent choice.
 */
export class ProbeRequestConfig {
  private readonly options: ProbeRequestOptions;
  private readonly userAgents: readonly string[];
  private readonly httpAgent: http.Agent;
  private readonly httpsAgent: https.Agent;

  constructor(options: ProbeRequestOptions, userAgents: readonly string[]) {
    this.options = options;
    this.userAgents = userAgents;

    const maxSockets = Math.max(options.threads, options.maxThreads);
    this.httpAgent = new http.Agent({ keepAlive: true, maxSockets });
    this.httpsAgent = new https.Agent({
      keepAlive: true,
      maxSockets,
      rejectUnauthorized: options.verifyTls,
    });
  }

  pickUserAgent(): string {
    if (this.options.userAgent !== undefined) return this.options.userAgent;
    if (this.options.rotateUserAgent && this.userAgents.length > 1) {
      return this.userAgents[Math.floor(Math.random() * this.userAgents.length)] ?? this.defaultUserAgent();
    }
    return this.defaultUserAgent();
  }

  getRequestConfig(): AxiosRequestConfig {
    return {
      method: 'GET',
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      timeout: this.options.timeoutMs,
      maxRedirects: this.options.followRedirects ? MAX_REDIRECTS : 0,
      responseType: 'stream',
      decompress: true,
      // Every status is data here; only transport failures throw
      validateStatus: () => true,
      headers: {
        ...DEFAULT_HEADERS,
        ...this.options.headers,
        'User-Agent': this.pickUserAgent(),
      },
    };
  }

  destroy(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }

  private defaultUserAgent(): string {
    return this.userAgents[0] ?? 'Mozilla/5.0';
  }
}
