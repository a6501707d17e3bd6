import { createHash } from 'node:crypto';
import http from 'node:http';
import { Readable } from 'node:stream';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { buildScanConfig } from '../src/config/build.js';
import { HttpProber, classifyTransportError, digestStream } from '../src/prober/client.js';

function md5(value: string): string {
  return createHash('md5').update(value).digest('hex');
}

describe('HttpProber', () => {
  let server: http.Server;
  let base: string;
  let prober: HttpProber;

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      switch (req.url) {
        case '/small':
          res.writeHead(200, { 'Content-Type': 'text/plain' });
          res.end('hello world');
          return;
        case '/agent':
          res.writeHead(200, { 'Content-Type': 'text/plain' });
          res.end(req.headers['user-agent'] ?? '');
          return;
        case '/chunked':
          res.writeHead(200, { 'Content-Type': 'application/octet-stream', 'Transfer-Encoding': 'chunked' });
          res.write(Buffer.alloc(100, 'a'));
          res.end(Buffer.alloc(100, 'a'));
          return;
        case '/exact':
          res.writeHead(200, { 'Content-Type': 'application/octet-stream', 'Content-Length': '64' });
          res.end(Buffer.alloc(64, 'c'));
          return;
        case '/declared':
          res.writeHead(200, { 'Content-Type': 'application/zip', 'Content-Length': '1000' });
          res.end(Buffer.alloc(1000, 'b'));
          return;
        case '/redirect':
          res.writeHead(302, { Location: '/small' });
          res.end();
          return;
        case '/forbidden':
          res.writeHead(403, { 'Content-Type': 'text/html' });
          res.end('<h1>Forbidden</h1>');
          return;
        case '/hang':
          // never answers
          return;
        default:
          res.writeHead(404);
          res.end();
      }
    });
    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('server not listening on TCP');
    base = `http://127.0.0.1:${address.port}`;

    const config = buildScanConfig({
      targets: [`${base}/`],
      timeoutMs: 500,
      sampleBytes: 16,
      largeFileThresholdBytes: 64,
      userAgent: 'residue-test',
    });
    prober = new HttpProber(config, ['fallback-agent']);
  });

  afterAll(async () => {
    prober.close();
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it('hashes and samples a small body', async () => {
    const result = await prober.probe(`${base}/small`);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.outcome).toMatchObject({
      status: 200,
      size: 11,
      bytesRead: 11,
      contentType: 'text/plain',
      sample: 'hello world',
      hash: md5('hello world'),
      partial: false,
    });
  });

  it('sends the configured User-Agent', async () => {
    const result = await prober.probe(`${base}/agent`);
    expect(result.success && result.outcome.sample).toBe('residue-test');
  });

  it('stops reading at the large-file threshold', async () => {
    const result = await prober.probe(`${base}/chunked`);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.outcome.partial).toBe(true);
    expect(result.outcome.bytesRead).toBe(64);
    expect(result.outcome.size).toBe(64);
    expect(result.outcome.sample).toBe('a'.repeat(16));
    expect(result.outcome.hash).toBe(md5('a'.repeat(64)));
  });

  it('reads a body of exactly the threshold size in full', async () => {
    const result = await prober.probe(`${base}/exact`);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.outcome.partial).toBe(false);
    expect(result.outcome.bytesRead).toBe(64);
    expect(result.outcome.hash).toBe(md5('c'.repeat(64)));
  });

  it('reads only the sample when the declared length is over the threshold', async () => {
    const result = await prober.probe(`${base}/declared`);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.outcome.partial).toBe(true);
    expect(result.outcome.bytesRead).toBe(16);
    expect(result.outcome.size).toBe(1000);
  });

  it('returns error statuses as outcomes', async () => {
    const result = await prober.probe(`${base}/forbidden`);
    expect(result.success && result.outcome.status).toBe(403);
  });

  it('follows redirects and records the final URL', async () => {
    const result = await prober.probe(`${base}/redirect`);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.outcome.status).toBe(200);
    expect(result.outcome.sample).toBe('hello world');
    expect(result.outcome.finalUrl).toBe(`${base}/small`);
  });

  it('reports a timeout as a transport error', async () => {
    const result = await prober.probe(`${base}/hang`);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe('timeout');
    expect(result.url).toBe(`${base}/hang`);
  });

  it('reports a cancelled probe as aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await prober.probe(`${base}/hang`, controller.signal);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.kind).toBe('aborted');
  });
});

describe('digestStream', () => {
  it('does not truncate a body that ends at the limit', async () => {
    const body = await digestStream(Readable.from([Buffer.alloc(60, 'a'), Buffer.alloc(40, 'a')]), 10, 100);

    expect(body.truncated).toBe(false);
    expect(body.bytesRead).toBe(100);
    expect(body.sample.toString('utf8')).toBe('a'.repeat(10));
    expect(body.hash).toBe(md5('a'.repeat(100)));
  });

  it('truncates once data arrives past the limit', async () => {
    const body = await digestStream(Readable.from([Buffer.alloc(100, 'a'), Buffer.alloc(1, 'b')]), 10, 100);

    expect(body.truncated).toBe(true);
    expect(body.bytesRead).toBe(100);
    expect(body.hash).toBe(md5('a'.repeat(100)));
  });
});

describe('classifyTransportError', () => {
  it('maps error codes to kinds', () => {
    const withCode = (code: string) => Object.assign(new Error(code), { code });

    expect(classifyTransportError(withCode('ENOTFOUND'), false, false).kind).toBe('dns');
    expect(classifyTransportError(withCode('ECONNREFUSED'), false, false).kind).toBe('connection');
    expect(classifyTransportError(withCode('CERT_HAS_EXPIRED'), false, false).kind).toBe('tls');
    expect(classifyTransportError(withCode('HPE_INVALID_CONSTANT'), false, false).kind).toBe('protocol');
    expect(classifyTransportError(new Error('socket hang up'), false, false).kind).toBe('connection');
    expect(classifyTransportError('odd', false, false)).toEqual({ kind: 'unknown', code: null, message: 'Unknown error' });
  });

  it('reads the code from the cause', () => {
    const error = new Error('request failed', { cause: Object.assign(new Error('dns'), { code: 'EAI_AGAIN' }) });
    expect(classifyTransportError(error, false, false)).toEqual({ kind: 'dns', code: 'EAI_AGAIN', message: 'request failed' });
  });

  it('prefers the timeout and abort flags over the code', () => {
    const canceled = Object.assign(new Error('canceled'), { code: 'ERR_CANCELED' });
    expect(classifyTransportError(canceled, true, false).kind).toBe('timeout');
    expect(classifyTransportError(canceled, false, true).kind).toBe('aborted');
  });
});
