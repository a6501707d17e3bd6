import { createHash } from 'node:crypto';
import type { Readable } from 'node:stream';
import axios from 'axios';
import type { ScanConfig } from '../schemas/config.js';
import type { ProbeResult, Prober, TransportError, TransportErrorKind } from '../types/http.js';
import { ProbeRequestConfig } from './config.js';

// Error codes that indicate the host itself could not be reached
const TRANSPORT_ERROR_CODES: Record<string, TransportErrorKind> = {
  ECONNABORTED: 'timeout',
  ETIMEDOUT: 'timeout',
  ESOCKETTIMEDOUT: 'timeout',
  ENOTFOUND: 'dns',
  EAI_AGAIN: 'dns',
  EAI_FAIL: 'dns',
  ECONNREFUSED: 'connection',
  ECONNRESET: 'connection',
  EHOSTUNREACH: 'connection',
  ENETUNREACH: 'connection',
  EPIPE: 'connection',
  ERR_CANCELED: 'aborted',
  ERR_FR_TOO_MANY_REDIRECTS: 'protocol',
  ERR_BAD_RESPONSE: 'protocol',
  ERR_INVALID_URL: 'protocol',
};

const TLS_CODE_PATTERN = /^(ERR_TLS|ERR_SSL|CERT_|DEPTH_ZERO|SELF_SIGNED|UNABLE_TO_(GET|VERIFY)|ERR_OSSL)/;

export interface ProbeBody {
  sample: Buffer;
  hash: string;
  bytesRead: number;
  truncated: boolean;
}

export type HttpProberOptions = Pick<
  ScanConfig,
  | 'headers'
  | 'userAgent'
  | 'rotateUserAgent'
  | 'verifyTls'
  | 'followRedirects'
  | 'timeoutMs'
  | 'threads'
  | 'maxThreads'
  | 'sampleBytes'
  | 'largeFileThresholdBytes'
>;

function readCode(error: unknown): string | null {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

function readCause(error: unknown): unknown {
  if (typeof error === 'object' && error !== null && 'cause' in error) {
    return error.cause;
  }
  return undefined;
}

export function classifyTransportError(error: unknown, timedOut: boolean, aborted: boolean): TransportError {
  const code = readCode(error) ?? readCode(readCause(error));
  const message = error instanceof Error ? error.message : 'Unknown error';

  let kind: TransportErrorKind = 'unknown';
  if (timedOut) {
    kind = 'timeout';
  } else if (aborted) {
    kind = 'aborted';
  } else if (code !== null && TRANSPORT_ERROR_CODES[code] !== undefined) {
    kind = TRANSPORT_ERROR_CODES[code] ?? 'unknown';
  } else if (code !== null && TLS_CODE_PATTERN.test(code)) {
    kind = 'tls';
  } else if (code !== null && code.startsWith('HPE_')) {
    kind = 'protocol';
  } else if (/socket hang up/i.test(message)) {
    kind = 'connection';
  }

  return { kind, code, message };
}

function readResponseUrl(request: unknown): string | null {
  if (typeof request !== 'object' || request === null || !('res' in request)) return null;
  const res = request.res;
  if (typeof res !== 'object' || res === null || !('responseUrl' in res)) return null;
  return typeof res.responseUrl === 'string' ? res.responseUrl : null;
}

function headerValue(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

/**
 * Read a body stream, hashing every byte while keeping only the first `sampleBytes`.
 * Stops, marking the body truncated, once data arrives past `limitBytes`.
 */
export function digestStream(
  stream: Readable,
  sampleBytes: number,
  limitBytes: number,
  signal?: AbortSignal
): Promise<ProbeBody> {
  return new Promise((resolve, reject) => {
    const hash = createHash('md5');
    const sampleChunks: Buffer[] = [];
    let sampled = 0;
    let totalBytes = 0;
    let truncated = false;
    let settled = false;

    const finish = (): void => {
      if (settled) return;
      settled = true;
      resolve({
        sample: Buffer.concat(sampleChunks),
        hash: hash.digest('hex'),
        bytesRead: totalBytes,
        truncated,
      });
    };

    const consume = (bytes: Buffer): void => {
      hash.update(bytes);
      totalBytes += bytes.length;
      if (sampled < sampleBytes) {
        const slice = bytes.subarray(0, sampleBytes - sampled);
        sampleChunks.push(slice);
        sampled += slice.length;
      }
    };

    stream.on('data', (chunk: Buffer) => {
      if (settled) return;
      const remaining = limitBytes - totalBytes;
      if (chunk.length <= remaining) {
        consume(chunk);
        return;
      }

      // Only data past the limit makes the body truncated
      consume(chunk.subarray(0, remaining));
      truncated = true;
      finish();
      stream.destroy();
    });

    stream.on('end', finish);

    stream.on('close', () => {
      // Stream was destroyed (truncated case)
      finish();
    });

    stream.on('error', (err) => {
      if (settled) return;
      settled = true;
      reject(err);
    });

    if (signal?.aborted) {
      stream.destroy(new Error('Body read aborted'));
    } else {
      signal?.addEventListener('abort', () => stream.destroy(new Error('Body read aborted')), { once: true });
    }
  });
}

/**
 * Issues one GET per candidate. HTTP statuses of every kind come back as outcomes;
 * only transport failures become error results. No retries.
 */
export class HttpProber implements Prober {
  private readonly requestConfig: ProbeRequestConfig;
  private readonly options: HttpProberOptions;

  constructor(options: HttpProberOptions, userAgents: readonly string[]) {
    this.options = options;
    this.requestConfig = new ProbeRequestConfig(options, userAgents);
  }

  async probe(url: string, signal?: AbortSignal): Promise<ProbeResult> {
    const startedAt = performance.now();
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await axios.request<Readable>({
        ...this.requestConfig.getRequestConfig(),
        url,
        signal: controller.signal,
      });

      const declaredLength = Number(headerValue(response.headers['content-length']) ?? Number.NaN);
      const hasDeclaredLength = Number.isFinite(declaredLength) && declaredLength >= 0;
      const { sampleBytes, largeFileThresholdBytes } = this.options;

      // Oversized bodies: read just enough to sniff and hash a prefix
      const limit = hasDeclaredLength && declaredLength > largeFileThresholdBytes ? sampleBytes : largeFileThresholdBytes;
      const body = await digestStream(response.data, sampleBytes, limit, controller.signal);
      const partial = body.truncated || (hasDeclaredLength && declaredLength > largeFileThresholdBytes);

      return {
        success: true,
        outcome: {
          url,
          finalUrl: readResponseUrl(response.request) ?? url,
          status: response.status,
          size: partial && hasDeclaredLength ? Math.max(declaredLength, body.bytesRead) : body.bytesRead,
          bytesRead: body.bytesRead,
          contentType: headerValue(response.headers['content-type']),
          sample: body.sample.toString('utf8'),
          hash: body.hash,
          elapsedMs: Math.round(performance.now() - startedAt),
          partial,
        },
      };
    } catch (error) {
      return {
        success: false,
        url,
        error: classifyTransportError(error, timedOut, signal?.aborted ?? false),
        elapsedMs: Math.round(performance.now() - startedAt),
      };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  close(): void {
    this.requestConfig.destroy();
  }
}
