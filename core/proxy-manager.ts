import axios from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { RetryPolicy } from '../utils/retry';
import { createEnhancedLogger } from '../utils/logger';
import { ErrorCode, hasErrorCode, ScraperError, ScraperErrors } from './errors';
import { describeProxy, isProxyExpired, ProxyEndpoint, proxyUrl, sameProxyEndpoint } from './models';

const logger = createEnhancedLogger('ProxyPool');

export interface ProxyProvider {
  readonly name: string;
  fetchProxies(count: number): Promise<ProxyEndpoint[]>;
  /** Best-effort notification that an endpoint went bad. */
  markInvalid(endpoint: ProxyEndpoint): Promise<void>;
}

export type ProxyProbe = (endpoint: ProxyEndpoint) => Promise<boolean>;

export interface ProxyPoolOptions {
  poolCount: number;
  validate: boolean;
  probeUrl: string;
  probeTimeoutMs?: number;
  acquireAttempts: number;
  acquireDelayMs: number;
  probe?: ProxyProbe;
  random?: () => number;
  now?: () => number;
}

/**
 * Liveness probe: a GET through the endpoint must answer 2xx within the timeout.
 */
export function createHttpProbe(probeUrl: string, timeoutMs: number = 10000): ProxyProbe {
  return async (endpoint) => {
    const agent = new HttpsProxyAgent(proxyUrl(endpoint));
    try {
      const response = await axios.get(probeUrl, {
        httpAgent: agent,
        httpsAgent: agent,
        proxy: false,
        timeout: timeoutMs,
        validateStatus: () => true,
      });
      return response.status >= 200 && response.status < 300;
    } catch (error: unknown) {
      logger.debug(`Probe through ${describeProxy(endpoint)} failed`, {
        reason: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  };
}

/**
 * ProxyPool - 代理池
 * 每个代理在一次加载内最多发放一次；列表为空时按配置数量重新拉取
 */
export class ProxyPool {
  private proxies: ProxyEndpoint[] = [];
  private readonly retryPolicy: RetryPolicy;
  private readonly probe: ProxyProbe;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(
    private readonly provider: ProxyProvider,
    private readonly options: ProxyPoolOptions,
  ) {
    this.probe = options.probe ?? createHttpProbe(options.probeUrl, options.probeTimeoutMs);
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.retryPolicy = new RetryPolicy({
      maxAttempts: options.acquireAttempts,
      delayMs: options.acquireDelayMs,
      shouldRetry: (error) => !hasErrorCode(error, ErrorCode.CANCELLED),
      onRetry: (error, attempt) =>
        logger.warn(`Proxy acquisition attempt ${attempt} failed, retrying`, {
          reason: error instanceof Error ? error.message : String(error),
        }),
    });
  }

  async load(count: number = this.options.poolCount): Promise<void> {
    let fetched: ProxyEndpoint[];
    try {
      fetched = await this.provider.fetchProxies(count);
    } catch (error: unknown) {
      if (error instanceof ScraperError) throw error;
      throw ScraperErrors.providerError(
        `Proxy provider ${this.provider.name} failed`,
        { provider: this.provider.name },
        error instanceof Error ? error : undefined,
      );
    }
    this.proxies = fetched.filter((p) => !isProxyExpired(p, this.now()));
    logger.info(`Loaded ${this.proxies.length} proxies from ${this.provider.name}`, { requested: count });
  }

  async acquire(signal?: AbortSignal): Promise<ProxyEndpoint> {
    return this.retryPolicy.execute(() => this.acquireOnce(), signal);
  }

  async invalidate(endpoint: ProxyEndpoint): Promise<void> {
    try {
      await this.provider.markInvalid(endpoint);
    } catch (error: unknown) {
      logger.warn(`Provider ${this.provider.name} rejected invalidation of ${describeProxy(endpoint)}`, {
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    const before = this.proxies.length;
    this.proxies = this.proxies.filter((p) => !sameProxyEndpoint(p, endpoint));
    logger.info(`Proxy ${describeProxy(endpoint)} invalidated`, {
      removedFromPool: before !== this.proxies.length,
    });
  }

  size(): number {
    return this.proxies.length;
  }

  private async acquireOnce(): Promise<ProxyEndpoint> {
    this.proxies = this.proxies.filter((p) => !isProxyExpired(p, this.now()));
    if (this.proxies.length === 0) {
      await this.load();
    }
    if (this.proxies.length === 0) {
      throw ScraperErrors.proxyUnavailable(`Provider ${this.provider.name} returned no usable proxy`);
    }

    const index = Math.min(Math.floor(this.random() * this.proxies.length), this.proxies.length - 1);
    const [endpoint] = this.proxies.splice(index, 1);

    if (this.options.validate && !(await this.probe(endpoint))) {
      throw ScraperErrors.proxyUnavailable(`Proxy ${describeProxy(endpoint)} failed liveness probe`, {
        proxy: describeProxy(endpoint),
      });
    }
    return endpoint;
  }
}
