import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { safeJsonParse } from '../utils/safe-json';
import { ScraperError, ScraperErrors } from './errors';

export interface SignRequest {
  path: string;
  /** URL-encoded query exactly as it will be sent, signature excluded. */
  query: string;
  userAgent: string;
  cookie: string;
}

export interface SignGateway {
  /** Resolves to a non-empty token or rejects with SIGN_FAILURE. */
  sign(request: SignRequest): Promise<string>;
}

// Sign services answer in one of three layouts; all collapse to { token } here.
const signResponseSchema = z
  .union([
    z.object({ token: z.string() }),
    z.object({ a_bogus: z.string() }),
    z.object({ data: z.object({ a_bogus: z.string() }) }),
  ])
  .transform((body) => {
    if ('token' in body) return { token: body.token };
    if ('a_bogus' in body) return { token: body.a_bogus };
    return { token: body.data.a_bogus };
  });

export interface HttpSignGatewayOptions {
  url: string;
  timeoutMs?: number;
}

export class HttpSignGateway implements SignGateway {
  private readonly http: AxiosInstance;

  constructor(
    private readonly options: HttpSignGatewayOptions,
    http?: AxiosInstance,
  ) {
    this.http =
      http ??
      axios.create({
        timeout: options.timeoutMs ?? 10000,
        validateStatus: () => true,
        responseType: 'text',
        transformResponse: (data: unknown) => data,
      });
  }

  async sign(request: SignRequest): Promise<string> {
    const context = { operation: 'sign', path: request.path };
    let status: number;
    let text: string;
    try {
      const response = await this.http.post<string>(
        this.options.url,
        {
          uri: request.path,
          query_params: request.query,
          user_agent: request.userAgent,
          cookies: request.cookie,
        },
        { headers: { 'Content-Type': 'application/json' } },
      );
      status = response.status;
      text = String(response.data ?? '');
    } catch (error: unknown) {
      if (error instanceof ScraperError) throw error;
      throw ScraperErrors.signFailure(
        'Sign service unreachable',
        context,
        error instanceof Error ? error : undefined,
      );
    }

    if (status !== 200) {
      throw ScraperErrors.signFailure(`Sign service answered HTTP ${status}`, { ...context, statusCode: status });
    }

    let body: unknown;
    try {
      body = safeJsonParse(text);
    } catch (error: unknown) {
      throw ScraperErrors.signFailure(
        'Sign service returned malformed JSON',
        context,
        error instanceof Error ? error : undefined,
      );
    }

    const parsed = signResponseSchema.safeParse(body);
    if (!parsed.success || parsed.data.token.length === 0) {
      throw ScraperErrors.signFailure('Sign service returned no token', context);
    }
    return parsed.data.token;
  }
}
