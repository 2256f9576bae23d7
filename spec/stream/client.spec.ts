import { Metadata } from '@grpc/grpc-js';
import { describe, expect, it } from 'vitest';
import {
  RECONNECTION_MAX_RETRIES,
  StreamError,
  buildChannelOptions,
  buildMetadata,
  buildRequest,
  connectionIdOf,
  parseTarget,
  withRetries,
} from '../../src/stream/client.ts';

const cfg = {
  dataServiceUrl: 'https://data.example.org',
  authToken: 'test-secret',
  requestName: 'events_processor',
  http2PingIntervalSecs: 30,
  http2PingTimeoutSecs: 10,
  reconnectionTimeoutSecs: 5,
};

describe('parseTarget', () => {
  it('uses TLS and port 443 for https', () => {
    expect(parseTarget('https://data.example.org')).toEqual({ target: 'data.example.org:443', tls: true });
  });

  it('keeps an explicit port for plain http', () => {
    expect(parseTarget('http://localhost:50051')).toEqual({ target: 'localhost:50051', tls: false });
  });

  it('rejects other schemes', () => {
    expect(() => parseTarget('ftp://x')).toThrow('unsupported data service scheme: ftp:');
  });
});

describe('buildRequest', () => {
  it('sends a transaction count only for a bounded range', () => {
    expect(buildRequest(100)).toEqual({ starting_version: '100' });
    expect(buildRequest(100, 199)).toEqual({ starting_version: '100', transactions_count: '100' });
  });
});

describe('buildMetadata', () => {
  it('carries the bearer token and the request name', () => {
    const md = buildMetadata(cfg);
    expect(md.get('authorization')).toEqual(['Bearer test-secret']);
    expect(md.get('x-aptos-request-name')).toEqual(['events_processor']);
  });
});

describe('connectionIdOf', () => {
  it('reads the connection id header', () => {
    const md = new Metadata();
    md.set('x-aptos-connection-id', 'abc-123');
    expect(connectionIdOf(md)).toBe('abc-123');
    expect(connectionIdOf(new Metadata())).toBe('unknown');
  });
});

describe('buildChannelOptions', () => {
  it('maps keepalive settings and message limits', () => {
    expect(buildChannelOptions(cfg)).toMatchObject({
      'grpc.keepalive_time_ms': 30_000,
      'grpc.keepalive_timeout_ms': 10_000,
      'grpc.max_receive_message_length': 256 * 1024 * 1024,
      'grpc.default_compression_algorithm': 2,
    });
  });
});

describe('withRetries', () => {
  it('returns the first success', async () => {
    let attempts = 0;
    const out = await withRetries(
      'connect',
      () => 'ConnectFailed',
      async (n) => {
        attempts = n;
        if (n < 3) throw new Error('refused');
        return 'ok';
      },
    );
    expect(out).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('gives up after the retry budget with the kind of the last failure', async () => {
    let attempts = 0;
    const err = await withRetries(
      'connect',
      (e) => (e instanceof Error && /deadline/i.test(e.message) ? 'ConnectTimeout' : 'ConnectFailed'),
      async () => {
        attempts++;
        throw new Error('Deadline exceeded');
      },
    ).catch((e: unknown) => e);

    expect(attempts).toBe(RECONNECTION_MAX_RETRIES);
    expect(err).toBeInstanceOf(StreamError);
    expect(err).toMatchObject({
      kind: 'ConnectTimeout',
      attempts: 5,
      message: 'connect failed after 5 attempts: Deadline exceeded',
    });
  });
});
