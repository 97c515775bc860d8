/**
 * PlatformApiClient - identity-bound API client
 *
 * The client owns one CredentialBinding at a time and runs every call through a fixed
 * recovery ladder:
 *
 * 1. Transient failures (socket errors, timeouts, malformed bodies, unexpected HTTP statuses)
 *    are retried on the same identity by the transport RetryPolicy.
 * 2. Identity failures (401/403, "not logged in", account errors, empty or blocked bodies)
 *    invalidate the binding, rebind and retry the call once.
 * 3. Rate limiting sleeps for the configured backoff and retries once on the same identity.
 * 4. An exhausted transient budget rotates the identity and retries once.
 *
 * Rotation is exclusive: while one runs, every other caller of `fetch()` waits for it, and
 * concurrent failures on the same binding produce a single rotation.
 */

import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { z } from 'zod';
import {
  API_PATHS,
  APP_STATUS,
  COMMON_PARAMS,
  FEED_PARAMS,
  PAGE_SIZES,
  PLATFORM_ORIGIN,
  PUBLISH_TIME_TYPES,
  SEARCH_SORT_TYPES,
  SIGNATURE_PARAM,
  VERIFY_COOKIES,
} from '../config/constants';
import { sleepOrCancel, throwIfCancelled } from '../utils/async';
import { createEnhancedLogger } from '../utils/logger';
import { RetryPolicy } from '../utils/retry';
import { isJsonRecord, safeJsonParse } from '../utils/safe-json';
import {
  commentPageSchema,
  feedPageSchema,
  itemDetailSchema,
  profileSchema,
  searchPageSchema,
  statusSchema,
  userPostPageSchema,
} from './api-schemas';
import { RequestContext } from './crawler.types';
import {
  ErrorClassifier,
  ErrorCode,
  ErrorContext,
  hasErrorCode,
  isIdentityError,
  isTransientError,
  ScraperError,
  ScraperErrors,
} from './errors';
import {
  createBinding,
  CredentialBinding,
  describeProxy,
  isProxyExpired,
  ProxyEndpoint,
  proxyUrl,
} from './models';
import { ProxyPool } from './proxy-manager';
import { CredentialPool } from './session-manager';
import { SignGateway } from './sign-gateway';

const logger = createEnhancedLogger('PlatformApiClient');

export enum ClientState {
  NO_IDENTITY = 'NO_IDENTITY',
  ACTIVE = 'ACTIVE',
  REQUEST_FAILED = 'REQUEST_FAILED',
  IDENTITY_EXPIRED = 'IDENTITY_EXPIRED',
  ROTATING = 'ROTATING',
  FATAL = 'FATAL',
}

export type QueryParams = Record<string, string | number>;

export interface OperationSpec<S extends z.ZodTypeAny> {
  name: string;
  path: string;
  method: 'GET' | 'POST';
  signed: boolean;
  schema: S;
}

function defineOperation<S extends z.ZodTypeAny>(
  name: string,
  path: string,
  schema: S,
  options: { method?: 'GET' | 'POST'; signed?: boolean } = {},
): OperationSpec<S> {
  return { name, path, schema, method: options.method ?? 'GET', signed: options.signed ?? true };
}

export const OPERATIONS = {
  selfCheck: defineOperation('selfCheck', API_PATHS.selfCheck, statusSchema),
  searchPage: defineOperation('searchPage', API_PATHS.searchPage, searchPageSchema),
  itemDetail: defineOperation('itemDetail', API_PATHS.itemDetail, itemDetailSchema),
  commentPage: defineOperation('commentPage', API_PATHS.commentPage, commentPageSchema),
  subCommentPage: defineOperation('subCommentPage', API_PATHS.subCommentPage, commentPageSchema),
  profile: defineOperation('profile', API_PATHS.profile, profileSchema),
  userPostPage: defineOperation('userPostPage', API_PATHS.userPostPage, userPostPageSchema),
  feedPage: defineOperation('feedPage', API_PATHS.feedPage, feedPageSchema, {
    method: 'POST',
    signed: false,
  }),
};

export interface ApiClientOptions {
  apiBaseUrl: string;
  userAgent: string;
  requestTimeoutMs: number;
  proxyEnabled: boolean;
  maxBindAttempts: number;
  bindRetryDelayMs: number;
  transportAttempts: number;
  retryDelayMs: number;
  rateLimitDelayMs: number;
  signAttempts: number;
  signDelayMs: number;
}

export interface SearchPageParams {
  keyword: string;
  offset: number;
  searchId: string;
  sortType?: number;
  publishTime?: number;
}

export function cookieValue(cookie: string, name: string): string | undefined {
  for (const part of cookie.split(';')) {
    const eq = part.indexOf('=');
    if (eq > 0 && part.slice(0, eq).trim() === name) {
      return part.slice(eq + 1).trim();
    }
  }
  return undefined;
}

export class PlatformApiClient {
  private state: ClientState = ClientState.NO_IDENTITY;
  private binding: CredentialBinding | null = null;
  private fatalError: ScraperError | null = null;
  private rotation: Promise<void> | null = null;
  private http: AxiosInstance | null = null;
  private httpKey: string | null = null;
  private readonly transportPolicy: RetryPolicy;
  private readonly signPolicy: RetryPolicy;

  constructor(
    private readonly credentialPool: CredentialPool,
    private readonly proxyPool: ProxyPool | null,
    private readonly signGateway: SignGateway,
    private readonly options: ApiClientOptions,
  ) {
    this.transportPolicy = new RetryPolicy({
      maxAttempts: options.transportAttempts,
      delayMs: options.retryDelayMs,
      shouldRetry: (error) => isTransientError(error),
      onRetry: (error, attempt) =>
        logger.debug(`Transient failure, attempt ${attempt}/${options.transportAttempts}`, {
          reason: error instanceof Error ? error.message : String(error),
        }),
    });
    this.signPolicy = new RetryPolicy({
      maxAttempts: options.signAttempts,
      delayMs: options.signDelayMs,
      shouldRetry: (error) => !hasErrorCode(error, ErrorCode.CANCELLED),
    });
  }

  getState(): ClientState {
    return this.state;
  }

  getBinding(): CredentialBinding | null {
    return this.binding;
  }

  /**
   * Binds a fresh identity. After a rotation already in flight, keeps the binding it left.
   */
  async bindIdentity(signal?: AbortSignal): Promise<void> {
    if (this.fatalError) throw this.fatalError;
    await this.exclusive(async () => {
      if (this.fatalError) throw this.fatalError;
      if (this.binding) return;
      await this.doBind(signal);
    });
  }

  async fetch<S extends z.ZodTypeAny>(
    operation: OperationSpec<S>,
    params: QueryParams,
    context: RequestContext = {},
  ): Promise<z.output<S>> {
    throwIfCancelled(context.signal);
    if (this.fatalError) throw this.fatalError;
    if (!this.binding && !this.rotation) {
      await this.bindIdentity(context.signal);
    }

    const usedBinding = await this.settledBinding();
    try {
      return await this.dispatchWithRetry(operation, params, context);
    } catch (error: unknown) {
      const failure = ErrorClassifier.classify(error, this.errorContext(operation, context));
      return this.recover(operation, params, context, failure, usedBinding);
    }
  }

  // ==========================================
  // Typed operations
  // ==========================================

  async searchPage(params: SearchPageParams, context: RequestContext = {}) {
    const query: QueryParams = {
      search_channel: 'aweme_general',
      enable_history: '1',
      keyword: params.keyword,
      search_source: 'normal_search',
      query_correct_type: '1',
      is_filter_search: '0',
      offset: params.offset,
      count: PAGE_SIZES.search,
      need_filter_settings: '1',
      list_type: 'multi',
      search_id: params.searchId,
    };
    const sortType = params.sortType ?? SEARCH_SORT_TYPES.GENERAL;
    const publishTime = params.publishTime ?? PUBLISH_TIME_TYPES.UNLIMITED;
    if (sortType !== SEARCH_SORT_TYPES.GENERAL || publishTime !== PUBLISH_TIME_TYPES.UNLIMITED) {
      query.filter_selected = JSON.stringify({
        sort_type: String(sortType),
        publish_time: String(publishTime),
      });
      query.is_filter_search = 1;
      query.search_source = 'tab_search';
    }
    return this.fetch(OPERATIONS.searchPage, query, { ...context, keyword: params.keyword });
  }

  async itemDetail(itemId: string, context: RequestContext = {}) {
    return this.fetch(OPERATIONS.itemDetail, { aweme_id: itemId }, context);
  }

  async commentPage(itemId: string, cursor: string, context: RequestContext = {}) {
    return this.fetch(
      OPERATIONS.commentPage,
      { aweme_id: itemId, cursor: cursor || '0', count: PAGE_SIZES.comments, item_type: 0 },
      context,
    );
  }

  async subCommentPage(itemId: string, commentId: string, cursor: string, context: RequestContext = {}) {
    return this.fetch(
      OPERATIONS.subCommentPage,
      {
        item_id: itemId,
        comment_id: commentId,
        cursor: cursor || '0',
        count: PAGE_SIZES.comments,
        item_type: 0,
      },
      context,
    );
  }

  async profile(secUserId: string, context: RequestContext = {}) {
    return this.fetch(
      OPERATIONS.profile,
      { sec_user_id: secUserId, publish_video_strategy_type: 2, personal_center_strategy: 1 },
      context,
    );
  }

  async userPostPage(secUserId: string, maxCursor: string, context: RequestContext = {}) {
    return this.fetch(
      OPERATIONS.userPostPage,
      {
        sec_user_id: secUserId,
        count: PAGE_SIZES.userPosts,
        max_cursor: maxCursor || '0',
        locate_query: 'false',
        publish_video_strategy_type: 2,
      },
      context,
    );
  }

  async feedPage(refreshIndex: number, tagId: number, context: RequestContext = {}) {
    return this.fetch(
      OPERATIONS.feedPage,
      { count: PAGE_SIZES.feed, refresh_index: refreshIndex, tag_id: tagId },
      context,
    );
  }

  // ==========================================
  // Recovery policy
  // ==========================================

  private async recover<S extends z.ZodTypeAny>(
    operation: OperationSpec<S>,
    params: QueryParams,
    context: RequestContext,
    failure: ScraperError,
    usedBinding: CredentialBinding | null,
  ): Promise<z.output<S>> {
    if (isIdentityError(failure)) {
      this.state = ClientState.IDENTITY_EXPIRED;
      logger.warn(`Identity rejected on ${operation.name}, rotating`, {
        code: failure.code,
        credential: usedBinding?.credential.name,
      });
      await this.rotate(usedBinding, failure.code === ErrorCode.BLOCKED, context.signal);
      return this.dispatchWithRetry(operation, params, context);
    }

    if (failure.code === ErrorCode.RATE_LIMITED) {
      logger.warn(`Rate limited on ${operation.name}, backing off ${this.options.rateLimitDelayMs}ms`);
      await sleepOrCancel(this.options.rateLimitDelayMs, context.signal);
      return this.dispatchWithRetry(operation, params, context);
    }

    if (isTransientError(failure)) {
      this.state = ClientState.REQUEST_FAILED;
      logger.warn(`Retry budget exhausted on ${operation.name}, rotating`, { code: failure.code });
      await this.rotate(usedBinding, true, context.signal);
      return this.dispatchWithRetry(operation, params, context);
    }

    throw failure;
  }

  /**
   * Invalidates `failed` and binds a new identity, unless another caller already replaced it.
   * A rotation that finds a proxy refresh or bind in flight waits for it, then checks again.
   */
  private async rotate(
    failed: CredentialBinding | null,
    invalidateProxy: boolean,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.exclusive(async () => {
      if (this.fatalError) throw this.fatalError;
      // a proxy refresh keeps the credential, so identity is compared by credential id
      if (failed && this.binding && this.binding.credential.id !== failed.credential.id) return;
      const victim = this.binding ?? failed;
      if (victim) {
        this.credentialPool.invalidate(victim.credential);
        if (invalidateProxy && victim.proxy && this.proxyPool) {
          await this.proxyPool.invalidate(victim.proxy);
        }
      }
      this.binding = null;
      await this.doBind(signal);
    });
  }

  /**
   * Runs `task` once no other exclusive task is in flight. Each task re-reads the binding,
   * since the one it waited on may have changed it.
   */
  private async exclusive(task: () => Promise<void>): Promise<void> {
    while (this.rotation) {
      // the owner of that rotation reports its failure; this task decides from the state it left
      await this.rotation.catch(() => undefined);
    }
    const previousState = this.state;
    this.state = ClientState.ROTATING;
    const run = Promise.resolve().then(task);
    this.rotation = run.finally(() => {
      this.rotation = null;
      if (this.state === ClientState.ROTATING) {
        this.state = this.binding ? ClientState.ACTIVE : previousState;
      }
    });
    await this.rotation;
  }

  private async doBind(signal?: AbortSignal): Promise<void> {
    const { maxBindAttempts, bindRetryDelayMs } = this.options;
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= maxBindAttempts; attempt++) {
      throwIfCancelled(signal);

      let candidate: CredentialBinding;
      try {
        const credential = await this.credentialPool.acquireActive();
        const proxy =
          this.options.proxyEnabled && this.proxyPool ? await this.proxyPool.acquire(signal) : null;
        candidate = createBinding(credential, proxy);
      } catch (error: unknown) {
        if (hasErrorCode(error, ErrorCode.CANCELLED)) throw error;
        lastError = error instanceof Error ? error : new Error(String(error));
        logger.warn(`Identity acquisition attempt ${attempt}/${maxBindAttempts} failed`, {
          reason: lastError.message,
        });
        if (attempt < maxBindAttempts) await sleepOrCancel(bindRetryDelayMs, signal);
        continue;
      }

      if (await this.probe(candidate, signal)) {
        this.binding = candidate;
        this.state = ClientState.ACTIVE;
        logger.info(`Bound credential ${candidate.credential.name}`, {
          proxy: describeProxy(candidate.proxy),
          attempt,
        });
        return;
      }

      lastError = ScraperErrors.unauthorized(`Login probe failed for ${candidate.credential.name}`);
      this.credentialPool.invalidate(candidate.credential);
      if (candidate.proxy && this.proxyPool) {
        await this.proxyPool.invalidate(candidate.proxy);
      }
      if (attempt < maxBindAttempts) await sleepOrCancel(bindRetryDelayMs, signal);
    }

    this.binding = null;
    this.state = ClientState.FATAL;
    this.fatalError = ScraperErrors.identityExhausted(maxBindAttempts, lastError);
    logger.error('Identity pool exhausted', this.fatalError);
    throw this.fatalError;
  }

  private async probe(candidate: CredentialBinding, signal?: AbortSignal): Promise<boolean> {
    try {
      const result = await this.transportPolicy.execute(
        () => this.send(OPERATIONS.selfCheck, { max_cursor: 0, count: 20 }, { signal }, candidate),
        signal,
      );
      return result.status_code === APP_STATUS.OK;
    } catch (error: unknown) {
      if (hasErrorCode(error, ErrorCode.CANCELLED)) throw error;
      logger.debug(`Login probe failed for ${candidate.credential.name}`, {
        reason: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  // ==========================================
  // Dispatch
  // ==========================================

  private dispatchWithRetry<S extends z.ZodTypeAny>(
    operation: OperationSpec<S>,
    params: QueryParams,
    context: RequestContext,
  ): Promise<z.output<S>> {
    return this.transportPolicy.execute(() => this.dispatch(operation, params, context), context.signal);
  }

  private async dispatch<S extends z.ZodTypeAny>(
    operation: OperationSpec<S>,
    params: QueryParams,
    context: RequestContext,
  ): Promise<z.output<S>> {
    throwIfCancelled(context.signal);
    await this.refreshExpiredProxy(context.signal);
    const binding = await this.settledBinding();
    if (!binding) {
      throw this.fatalError ?? ScraperErrors.noActiveCredential();
    }
    return this.send(operation, params, context, binding);
  }

  /** Waits out any rotation in flight and returns the binding it left behind. */
  private async settledBinding(): Promise<CredentialBinding | null> {
    while (this.rotation) {
      await this.rotation.catch(() => undefined);
    }
    return this.binding;
  }

  /**
   * Swaps an expired proxy for a fresh one, keeping the credential. A failed swap falls back
   * to a full rebind.
   */
  private async refreshExpiredProxy(signal?: AbortSignal): Promise<void> {
    const current = await this.settledBinding();
    if (!current?.proxy || !this.proxyPool || !isProxyExpired(current.proxy)) return;

    const pool = this.proxyPool;
    await this.exclusive(async () => {
      if (this.binding !== current || !current.proxy) return;
      logger.info(`Proxy ${describeProxy(current.proxy)} expired, replacing`);
      await pool.invalidate(current.proxy);
      try {
        const fresh = await pool.acquire(signal);
        this.binding = createBinding(current.credential, fresh);
      } catch (error: unknown) {
        if (hasErrorCode(error, ErrorCode.CANCELLED)) throw error;
        logger.warn('Proxy replacement failed, rebinding identity', {
          reason: error instanceof Error ? error.message : String(error),
        });
        this.binding = null;
        await this.doBind(signal);
      }
    });
  }

  private async send<S extends z.ZodTypeAny>(
    operation: OperationSpec<S>,
    params: QueryParams,
    context: RequestContext,
    binding: CredentialBinding,
  ): Promise<z.output<S>> {
    const userAgent = binding.credential.userAgent ?? this.options.userAgent;
    const query = this.canonicalQuery(operation, params, binding);

    let url = `${operation.path}?${query}`;
    if (operation.signed) {
      const token = await this.sign(operation, query, userAgent, binding, context);
      url += `&${SIGNATURE_PARAM}=${encodeURIComponent(token)}`;
    }

    const config: AxiosRequestConfig = {
      method: operation.method,
      url,
      headers: this.buildHeaders(operation, binding, userAgent, context),
      signal: context.signal,
    };

    let status: number;
    let text: string;
    try {
      const response = await this.transportFor(binding.proxy).request<string>(config);
      status = response.status;
      text = typeof response.data === 'string' ? response.data : String(response.data ?? '');
    } catch (error: unknown) {
      if (context.signal?.aborted) throw ScraperErrors.cancelled(this.errorContext(operation, context));
      const classified = ErrorClassifier.classify(error, this.errorContext(operation, context));
      if (classified.code === ErrorCode.UNKNOWN_ERROR) {
        throw ScraperErrors.networkError(
          classified.message,
          classified.context,
          error instanceof Error ? error : undefined,
        );
      }
      throw classified;
    }

    return this.interpret(operation, status, text, context, binding);
  }

  private interpret<S extends z.ZodTypeAny>(
    operation: OperationSpec<S>,
    status: number,
    text: string,
    context: RequestContext,
    binding: CredentialBinding,
  ): z.output<S> {
    const errorContext = {
      ...this.errorContext(operation, context),
      credential: binding.credential.name,
      proxy: describeProxy(binding.proxy),
    };

    if (status !== 200) {
      throw ScraperError.fromHttpResponse({ status }, errorContext);
    }

    const trimmed = text.trim();
    if (trimmed.length === 0) {
      throw ScraperErrors.blocked('Empty response body', errorContext);
    }

    let body: unknown;
    try {
      body = safeJsonParse(trimmed);
    } catch (error: unknown) {
      if (trimmed.toLowerCase().includes('blocked')) {
        throw ScraperErrors.blocked('Request blocked', errorContext);
      }
      throw ScraperErrors.invalidResponse(
        'Malformed JSON response',
        errorContext,
        error instanceof Error ? error : undefined,
      );
    }
    if (!isJsonRecord(body)) {
      throw ScraperErrors.invalidResponse('Response body is not an object', errorContext);
    }

    const appStatus = body.status_code;
    if (typeof appStatus === 'number') {
      const appContext = { ...errorContext, appStatusCode: appStatus };
      if (appStatus === APP_STATUS.NOT_LOGGED_IN) {
        throw ScraperErrors.unauthorized('Account not logged in', appContext);
      }
      if (APP_STATUS.ACCOUNT_ERRORS.some((code) => code === appStatus)) {
        throw ScraperErrors.unauthorized('Account error', appContext);
      }
      if (appStatus !== APP_STATUS.OK && appStatus !== APP_STATUS.PARTIAL) {
        logger.warn(`Application status ${appStatus} on ${operation.name}`, {
          ...appContext,
          statusMsg: body.status_msg,
        });
      }
    }

    const parsed = operation.schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw ScraperErrors.invalidResponse(
        `Unexpected ${operation.name} response: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`,
        errorContext,
      );
    }
    return parsed.data;
  }

  private async sign<S extends z.ZodTypeAny>(
    operation: OperationSpec<S>,
    query: string,
    userAgent: string,
    binding: CredentialBinding,
    context: RequestContext,
  ): Promise<string> {
    try {
      return await this.signPolicy.execute(async () => {
        const token = await this.signGateway.sign({
          path: operation.path,
          query,
          userAgent,
          cookie: binding.credential.cookie,
        });
        if (!token) {
          throw ScraperErrors.signFailure('Empty token', this.errorContext(operation, context));
        }
        return token;
      }, context.signal);
    } catch (error: unknown) {
      if (hasErrorCode(error, ErrorCode.CANCELLED) || hasErrorCode(error, ErrorCode.SIGN_FAILURE)) {
        throw error;
      }
      throw ScraperErrors.signFailure(
        `Signing ${operation.name} failed`,
        this.errorContext(operation, context),
        error instanceof Error ? error : undefined,
      );
    }
  }

  private canonicalQuery<S extends z.ZodTypeAny>(
    operation: OperationSpec<S>,
    params: QueryParams,
    binding: CredentialBinding,
  ): string {
    const merged = new URLSearchParams();
    const append = (source: Readonly<Record<string, string | number>>): void => {
      for (const [key, value] of Object.entries(source)) {
        merged.set(key, String(value));
      }
    };

    if (operation.signed) {
      append(params);
      append(COMMON_PARAMS);
      for (const name of VERIFY_COOKIES) {
        const value = cookieValue(binding.credential.cookie, name);
        if (value) append({ [name]: value });
      }
    } else {
      append(FEED_PARAMS);
      append(params);
    }
    return merged.toString();
  }

  private buildHeaders<S extends z.ZodTypeAny>(
    operation: OperationSpec<S>,
    binding: CredentialBinding,
    userAgent: string,
    context: RequestContext,
  ): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json, text/plain, */*',
      'Accept-Language': 'zh-CN,zh;q=0.9',
      Cookie: binding.credential.cookie,
      Origin: PLATFORM_ORIGIN,
      Referer: context.keyword
        ? `${PLATFORM_ORIGIN}/search/${encodeURIComponent(context.keyword)}`
        : `${PLATFORM_ORIGIN}/user/self`,
      'User-Agent': userAgent,
    };
    if (operation.method === 'POST') {
      headers.Referer = `${PLATFORM_ORIGIN}/discover`;
      headers['Content-Type'] = 'application/x-www-form-urlencoded; charset=UTF-8';
      headers['X-Secsdk-Csrf-Token'] = 'DOWNGRADE';
    }
    return headers;
  }

  /** One axios instance per proxy; rebuilt only when the proxy changes. */
  private transportFor(proxy: ProxyEndpoint | null): AxiosInstance {
    const key = proxy ? proxyUrl(proxy) : 'direct';
    if (this.http && this.httpKey === key) return this.http;

    const config: AxiosRequestConfig = {
      baseURL: this.options.apiBaseUrl,
      timeout: this.options.requestTimeoutMs,
      validateStatus: () => true,
      proxy: false,
      responseType: 'text',
      transformResponse: (data: unknown) => data,
    };
    if (proxy) {
      const agent = new HttpsProxyAgent(key);
      config.httpAgent = agent;
      config.httpsAgent = agent;
    }

    this.http = axios.create(config);
    this.httpKey = key;
    logger.debug(`Transport created (${describeProxy(proxy)})`);
    return this.http;
  }

  private errorContext<S extends z.ZodTypeAny>(
    operation: OperationSpec<S>,
    context: RequestContext,
  ): ErrorContext {
    return {
      operation: operation.name,
      keyword: context.keyword,
      creatorId: context.creatorId,
      checkpointId: context.checkpointId ?? undefined,
    };
  }
}

/** The typed operations handlers and processors call. */
export type CrawlerApi = Pick<
  PlatformApiClient,
  'searchPage' | 'itemDetail' | 'commentPage' | 'subCommentPage' | 'profile' | 'userPostPage' | 'feedPage'
>;
