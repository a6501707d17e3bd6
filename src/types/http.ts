// Probe executor types

export type TransportErrorKind =
  | 'timeout'
  | 'dns'
  | 'connection'
  | 'tls'
  | 'protocol'
  | 'aborted'
  | 'unknown';

export interface TransportError {
  kind: TransportErrorKind;
  code: string | null;
  message: string;
}

export interface ProbeOutcome {
  url: string;
  finalUrl: string;
  status: number;
  /** Declared or streamed body size in bytes. */
  size: number;
  bytesRead: number;
  contentType: string | null;
  /** First bytes of the body, decoded as UTF-8, for text sniffing. */
  sample: string;
  /** MD5 of every byte read; covers only the prefix when `partial` is set. */
  hash: string;
  elapsedMs: number;
  partial: boolean;
}

export interface ProbeSuccessResult {
  success: true;
  outcome: ProbeOutcome;
}

export interface ProbeErrorResult {
  success: false;
  url: string;
  error: TransportError;
  elapsedMs: number;
}

export type ProbeResult = ProbeSuccessResult | ProbeErrorResult;

export interface Prober {
  probe(url: string, signal?: AbortSignal): Promise<ProbeResult>;
  close?(): void;
}
