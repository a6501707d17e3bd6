import type { ProbeOutcome, ProbeResult, Prober, TransportErrorKind } from '../src/types/http.js';

export interface FakeResponse {
  status: number;
  body?: string;
  contentType?: string | null;
  finalUrl?: string;
  partial?: boolean;
}

export function outcome(url: string, response: FakeResponse): ProbeOutcome {
  const body = response.body ?? '';
  return {
    url,
    finalUrl: response.finalUrl ?? url,
    status: response.status,
    size: body.length,
    bytesRead: body.length,
    contentType: response.contentType === undefined ? 'text/plain' : response.contentType,
    sample: body,
    hash: `hash:${response.status}:${body}`,
    elapsedMs: 5,
    partial: response.partial ?? false,
  };
}

/**
 * In-memory prober keyed by request path. Paths with no entry get `fallback`;
 * paths listed in `failures` produce a transport error of that kind.
 */
export class FakeProber implements Prober {
  readonly requested: string[] = [];
  private readonly responses: Map<string, FakeResponse>;
  private readonly failures: Map<string, TransportErrorKind>;
  private readonly fallback: FakeResponse | null;
  closed = false;

  constructor(options: {
    responses?: Record<string, FakeResponse>;
    failures?: Record<string, TransportErrorKind>;
    fallback?: FakeResponse | null;
  }) {
    this.responses = new Map(Object.entries(options.responses ?? {}));
    this.failures = new Map(Object.entries(options.failures ?? {}));
    this.fallback = options.fallback === undefined ? { status: 404, body: 'Not Found', contentType: 'text/plain' } : options.fallback;
  }

  async probe(url: string): Promise<ProbeResult> {
    const path = new URL(url).pathname;
    this.requested.push(path);

    const failure = this.failures.get(path);
    const response = this.responses.get(path) ?? this.fallback;
    if (failure !== undefined || response === null) {
      return {
        success: false,
        url,
        error: { kind: failure ?? 'connection', code: null, message: 'simulated failure' },
        elapsedMs: 1,
      };
    }

    return { success: true, outcome: outcome(url, response) };
  }

  close(): void {
    this.closed = true;
  }

  /** Requests that were not baseline sanity probes. */
  candidatePaths(): string[] {
    return this.requested.filter(path => !path.includes('-not-a-real-path-'));
  }
}

/**
 * Prober that yields to the event loop before answering, so concurrent workers
 * overlap. Reports a scripted latency per request number and tracks how many
 * probes are in flight.
 */
export class PacedProber implements Prober {
  requests = 0;
  inFlight = 0;
  peakInFlight = 0;

  constructor(
    private readonly options: {
      latencyMs?: (request: number) => number;
      respond?: (path: string) => FakeResponse;
      onRequest?: (request: number) => void;
    } = {}
  ) {}

  async probe(url: string): Promise<ProbeResult> {
    const request = ++this.requests;
    this.inFlight++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight);
    this.options.onRequest?.(request);

    await new Promise<void>(resolve => setImmediate(resolve));

    this.inFlight--;
    const response = this.options.respond?.(new URL(url).pathname) ?? { status: 404, body: 'Not Found' };
    return {
      success: true,
      outcome: { ...outcome(url, response), elapsedMs: this.options.latencyMs?.(request) ?? 5 },
    };
  }
}
