import axios from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { API_PATHS } from '../../config/constants';
import { ApiClientOptions, ClientState, cookieValue, PlatformApiClient } from '../../core/api-client';
import { StaticCredentialSource } from '../../core/cookie-manager';
import { ErrorCode } from '../../core/errors';
import { createProxyEndpoint, ProxyEndpoint } from '../../core/models';
import { ProxyPool, ProxyProvider } from '../../core/proxy-manager';
import { CredentialPool } from '../../core/session-manager';
import { SignGateway, SignRequest } from '../../core/sign-gateway';

interface RequestLike {
  url?: string;
  headers?: Record<string, string>;
}

interface Reply {
  status: number;
  data: string;
}

const { mockHttp } = vi.hoisted(() => ({
  mockHttp: { request: vi.fn<(config: RequestLike) => Promise<Reply>>() },
}));

vi.mock('axios', () => ({
  default: {
    create: vi.fn(() => mockHttp),
    get: vi.fn(),
  },
}));

const COOKIE_A = 'sessionid=test-a; msToken=test-ms';
const COOKIE_B = 'sessionid=test-b';

const options: ApiClientOptions = {
  apiBaseUrl: 'https://api.test',
  userAgent: 'test-agent',
  requestTimeoutMs: 1000,
  proxyEnabled: false,
  maxBindAttempts: 10,
  bindRetryDelayMs: 0,
  transportAttempts: 5,
  retryDelayMs: 0,
  rateLimitDelayMs: 0,
  signAttempts: 3,
  signDelayMs: 0,
};

function ok(body: Record<string, unknown>): Reply {
  return { status: 200, data: JSON.stringify(body) };
}

/** Routes every request by API path and cookie; the login probe succeeds unless overridden. */
function serve(handler: (path: string, cookie: string) => Reply): void {
  mockHttp.request.mockImplementation(async (config) => {
    const path = (config.url ?? '').split('?')[0];
    const cookie = config.headers?.Cookie ?? '';
    if (path === API_PATHS.selfCheck) return ok({ status_code: 0 });
    return handler(path, cookie);
  });
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

function callsTo(path: string): RequestLike[] {
  return mockHttp.request.mock.calls.map(([config]) => config).filter((config) => (config.url ?? '').startsWith(path));
}

const stubGateway: SignGateway = {
  sign: async () => 'test-token',
};

function createPool(records = [
  { name: 'a', cookie: COOKIE_A },
  { name: 'b', cookie: COOKIE_B },
]): CredentialPool {
  return new CredentialPool(new StaticCredentialSource(records));
}

describe('PlatformApiClient', () => {
  beforeEach(() => {
    mockHttp.request.mockReset();
    vi.mocked(axios.create).mockClear();
  });

  it('signs the canonical query and sends the credential cookie', async () => {
    serve(() => ok({ status_code: 0, aweme_detail: { aweme_id: '42' } }));
    const client = new PlatformApiClient(createPool(), null, stubGateway, options);

    const result = await client.itemDetail('42');

    expect(result.aweme_detail).toEqual({ aweme_id: '42' });
    const [request] = callsTo(API_PATHS.itemDetail);
    expect(request.url).toContain('aweme_id=42');
    expect(request.url).toContain('device_platform=webapp');
    expect(request.url).toContain('msToken=test-ms');
    expect(request.url).toMatch(/&a_bogus=test-token$/);
    expect(request.headers?.Cookie).toBe(COOKIE_A);
    expect(request.headers?.['User-Agent']).toBe('test-agent');
    expect(client.getState()).toBe(ClientState.ACTIVE);
  });

  it('copies the verify cookies into the signed query', async () => {
    serve(() => ok({ aweme_detail: {} }));
    const pool = createPool([{ name: 'w', cookie: 'sessionid=test-w; webid=7000; msToken=test-ms' }]);
    const client = new PlatformApiClient(pool, null, stubGateway, options);

    await client.itemDetail('42');

    const [request] = callsTo(API_PATHS.itemDetail);
    expect(request.url).toContain('&msToken=test-ms&webid=7000&a_bogus=');
  });

  it('rotates once on Blocked and retries on the new identity', async () => {
    serve((path, cookie) => (cookie === COOKIE_A ? { status: 403, data: '' } : ok({ aweme_detail: { aweme_id: '7' } })));
    const pool = createPool();
    const invalidate = vi.spyOn(pool, 'invalidate');
    const client = new PlatformApiClient(pool, null, stubGateway, options);

    const result = await client.itemDetail('7');

    expect(result.aweme_detail).toEqual({ aweme_id: '7' });
    expect(invalidate).toHaveBeenCalledTimes(1);
    expect(invalidate.mock.calls[0][0].name).toBe('a');
    expect(client.getBinding()?.credential.name).toBe('b');
    expect(callsTo(API_PATHS.itemDetail)).toHaveLength(2);
  });

  it('treats an empty body as Blocked', async () => {
    serve((path, cookie) => (cookie === COOKIE_A ? { status: 200, data: '   ' } : ok({ aweme_detail: null })));
    const pool = createPool();
    const invalidate = vi.spyOn(pool, 'invalidate');
    const client = new PlatformApiClient(pool, null, stubGateway, options);

    await client.itemDetail('7');

    expect(invalidate).toHaveBeenCalledTimes(1);
    expect(client.getBinding()?.credential.name).toBe('b');
  });

  it('shares one rotation between concurrent callers on the same binding', async () => {
    serve((path, cookie) => (cookie === COOKIE_A ? { status: 403, data: '' } : ok({ aweme_detail: {} })));
    const pool = createPool();
    const invalidate = vi.spyOn(pool, 'invalidate');
    const client = new PlatformApiClient(pool, null, stubGateway, options);

    await Promise.all([client.itemDetail('1'), client.itemDetail('2'), client.itemDetail('3')]);

    expect(invalidate).toHaveBeenCalledTimes(1);
    expect(pool.activeCount()).toBe(1);
  });

  it('backs off on rate limiting without invalidating the identity', async () => {
    let limited = true;
    serve(() => {
      if (limited) {
        limited = false;
        return { status: 429, data: '' };
      }
      return ok({ aweme_detail: { aweme_id: '9' } });
    });
    const pool = createPool();
    const invalidate = vi.spyOn(pool, 'invalidate');
    const client = new PlatformApiClient(pool, null, stubGateway, options);

    await expect(client.itemDetail('9')).resolves.toMatchObject({ aweme_detail: { aweme_id: '9' } });
    expect(invalidate).not.toHaveBeenCalled();
    expect(client.getBinding()?.credential.name).toBe('a');
    expect(callsTo(API_PATHS.itemDetail)).toHaveLength(2);
  });

  it('rotates after the transient budget is exhausted', async () => {
    serve((path, cookie) => {
      if (cookie === COOKIE_A) throw Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
      return ok({ aweme_detail: { aweme_id: '5' } });
    });
    const pool = createPool();
    const invalidate = vi.spyOn(pool, 'invalidate');
    const client = new PlatformApiClient(pool, null, stubGateway, options);

    await client.itemDetail('5');

    expect(callsTo(API_PATHS.itemDetail)).toHaveLength(6);
    expect(invalidate).toHaveBeenCalledTimes(1);
    expect(client.getBinding()?.credential.name).toBe('b');
  });

  it('exhausts after maxBindAttempts on an empty pool without any network call', async () => {
    serve(() => ok({}));
    const client = new PlatformApiClient(createPool([]), null, stubGateway, options);

    await expect(client.itemDetail('1')).rejects.toMatchObject({
      code: ErrorCode.IDENTITY_EXHAUSTED,
      message: 'No usable identity after 10 attempts',
    });
    await expect(client.itemDetail('2')).rejects.toMatchObject({ code: ErrorCode.IDENTITY_EXHAUSTED });

    expect(mockHttp.request).not.toHaveBeenCalled();
    expect(client.getState()).toBe(ClientState.FATAL);
  });

  it('invalidates credentials that fail the login probe', async () => {
    mockHttp.request.mockResolvedValue(ok({ status_code: 8 }));
    const pool = createPool();
    const client = new PlatformApiClient(pool, null, stubGateway, options);

    await expect(client.itemDetail('1')).rejects.toMatchObject({ code: ErrorCode.IDENTITY_EXHAUSTED });

    expect(pool.activeCount()).toBe(0);
    expect(callsTo(API_PATHS.selfCheck)).toHaveLength(2);
    expect(callsTo(API_PATHS.itemDetail)).toHaveLength(0);
  });

  it('returns data alongside an unexpected application status', async () => {
    serve(() => ok({ status_code: 2154, status_msg: 'busy', aweme_detail: null }));
    const client = new PlatformApiClient(createPool(), null, stubGateway, options);

    const result = await client.itemDetail('1');

    expect(result.status_code).toBe(2154);
    expect(result.aweme_detail).toBeNull();
  });

  it('fails the call with SIGN_FAILURE after the sign attempts', async () => {
    serve(() => ok({ aweme_detail: {} }));
    const sign = vi.fn(async (request: SignRequest) => {
      if (request.path === API_PATHS.itemDetail) throw new Error('sign service down');
      return 'test-token';
    });
    const client = new PlatformApiClient(createPool(), null, { sign }, options);

    await expect(client.itemDetail('1')).rejects.toMatchObject({ code: ErrorCode.SIGN_FAILURE });

    expect(sign.mock.calls.filter(([request]) => request.path === API_PATHS.itemDetail)).toHaveLength(3);
    expect(callsTo(API_PATHS.itemDetail)).toHaveLength(0);
  });

  it('sends the feed request unsigned as a POST', async () => {
    serve(() => ok({ StatusCode: 0, cards: [] }));
    const sign = vi.fn(async () => 'test-token');
    const client = new PlatformApiClient(createPool(), null, { sign }, options);

    await client.feedPage(20, 0);

    const [request] = callsTo(API_PATHS.feedPage);
    expect(request.url).toContain('refresh_index=20');
    expect(request.url).not.toContain('a_bogus');
    expect(sign).toHaveBeenCalledTimes(1);
  });

  it('stops with CANCELLED once the signal aborts', async () => {
    serve(() => ok({ aweme_detail: {} }));
    const client = new PlatformApiClient(createPool(), null, stubGateway, options);
    const controller = new AbortController();
    controller.abort();

    await expect(client.itemDetail('1', { signal: controller.signal })).rejects.toMatchObject({
      code: ErrorCode.CANCELLED,
    });
    expect(mockHttp.request).not.toHaveBeenCalled();
  });

  describe('with a proxy pool', () => {
    const T0 = Date.parse('2025-01-01T00:00:00Z');

    class SequenceProvider implements ProxyProvider {
      readonly name = 'sequence';
      readonly retired: ProxyEndpoint[] = [];
      private index = 0;

      constructor(private readonly endpoints: ProxyEndpoint[]) {}

      async fetchProxies(): Promise<ProxyEndpoint[]> {
        const next = this.endpoints[this.index];
        this.index++;
        return next ? [next] : [];
      }

      async markInvalid(endpoint: ProxyEndpoint): Promise<void> {
        this.retired.push(endpoint);
      }
    }

    beforeEach(() => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(T0);
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('replaces an expired proxy before dispatch and keeps the credential', async () => {
      serve(() => ok({ aweme_detail: {} }));
      const first = createProxyEndpoint({ host: '10.0.0.1', port: 8000, expiresAt: T0 + 10_000 });
      const second = createProxyEndpoint({ host: '10.0.0.2', port: 8000, expiresAt: T0 + 100_000 });
      const provider = new SequenceProvider([first, second]);
      const proxyPool = new ProxyPool(provider, {
        poolCount: 1,
        validate: false,
        probeUrl: 'https://probe.test/ip',
        acquireAttempts: 1,
        acquireDelayMs: 0,
      });
      const pool = createPool();
      const invalidate = vi.spyOn(pool, 'invalidate');
      const client = new PlatformApiClient(pool, proxyPool, stubGateway, { ...options, proxyEnabled: true });

      await client.itemDetail('1');
      expect(client.getBinding()?.proxy?.host).toBe('10.0.0.1');

      vi.setSystemTime(T0 + 10_000);
      await client.itemDetail('2');

      expect(client.getBinding()?.proxy?.host).toBe('10.0.0.2');
      expect(client.getBinding()?.credential.name).toBe('a');
      expect(provider.retired.map((p) => p.host)).toEqual(['10.0.0.1']);
      expect(invalidate).not.toHaveBeenCalled();
      expect(vi.mocked(axios.create)).toHaveBeenCalledTimes(2);

      await client.itemDetail('3');
      expect(vi.mocked(axios.create)).toHaveBeenCalledTimes(2);
    });

    it('still rotates a blocked credential when a proxy refresh is in flight', async () => {
      const forbidden = deferred<Reply>();
      let held = false;
      mockHttp.request.mockImplementation(async (config) => {
        const url = config.url ?? '';
        if (url.startsWith(API_PATHS.selfCheck)) return ok({ status_code: 0 });
        if (url.includes('aweme_id=A&') && config.headers?.Cookie === COOKIE_A) {
          if (held) return { status: 403, data: '' };
          held = true;
          return forbidden.promise;
        }
        return ok({ aweme_detail: { aweme_id: 'ok' } });
      });

      class GatedProvider extends SequenceProvider {
        readonly gate = deferred<void>();
        calls = 0;

        async fetchProxies(): Promise<ProxyEndpoint[]> {
          this.calls++;
          if (this.calls === 2) await this.gate.promise;
          return super.fetchProxies();
        }
      }

      const provider = new GatedProvider([
        createProxyEndpoint({ host: '10.0.0.1', port: 8000, expiresAt: T0 + 10_000 }),
        createProxyEndpoint({ host: '10.0.0.2', port: 8000, expiresAt: T0 + 100_000 }),
        createProxyEndpoint({ host: '10.0.0.3', port: 8000, expiresAt: T0 + 100_000 }),
      ]);
      const proxyPool = new ProxyPool(provider, {
        poolCount: 1,
        validate: false,
        probeUrl: 'https://probe.test/ip',
        acquireAttempts: 1,
        acquireDelayMs: 0,
      });
      const pool = createPool();
      const invalidate = vi.spyOn(pool, 'invalidate');
      const client = new PlatformApiClient(pool, proxyPool, stubGateway, { ...options, proxyEnabled: true });
      await client.bindIdentity();

      const blocked = client.itemDetail('A');
      await vi.waitFor(() => expect(callsTo(API_PATHS.itemDetail)).toHaveLength(1));

      vi.setSystemTime(T0 + 10_000);
      const refreshing = client.itemDetail('C');
      await vi.waitFor(() => expect(provider.calls).toBe(2));

      forbidden.resolve({ status: 403, data: '' });
      provider.gate.resolve();

      await expect(blocked).resolves.toMatchObject({ aweme_detail: { aweme_id: 'ok' } });
      await expect(refreshing).resolves.toMatchObject({ aweme_detail: { aweme_id: 'ok' } });
      expect(invalidate).toHaveBeenCalledTimes(1);
      expect(invalidate.mock.calls[0][0].name).toBe('a');
      expect(client.getBinding()?.credential.name).toBe('b');
      expect(client.getBinding()?.proxy?.host).toBe('10.0.0.3');
      expect(provider.retired.map((p) => p.host)).toEqual(['10.0.0.1', '10.0.0.2']);
    });
  });
});

describe('cookieValue', () => {
  it('reads one cookie out of a header', () => {
    expect(cookieValue(COOKIE_A, 'msToken')).toBe('test-ms');
    expect(cookieValue(COOKIE_B, 'msToken')).toBeUndefined();
  });
});
