import axios, { AxiosInstance } from 'axios';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { createEnhancedLogger } from '../utils/logger';
import { safeJsonParse } from '../utils/safe-json';
import { ScraperErrors } from './errors';
import { createProxyEndpoint, ProxyEndpoint, ProxyProtocol } from './models';
import { ProxyProvider } from './proxy-manager';

const logger = createEnhancedLogger('ProxyProvider');

/** Seconds shaved off a vendor TTL so an endpoint is dropped before the vendor kills it. */
export const EXPIRY_SAFETY_MARGIN_SECONDS = 5;

const PROXY_ENTRY_PATTERN = /^(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}):(\d{1,5}),(\d+)$/;

const extractionResponseSchema = z.object({
  code: z.number(),
  msg: z.string().optional(),
  data: z
    .object({
      proxy_list: z.array(z.string()).default([]),
    })
    .optional(),
});

export interface HttpProxyProviderOptions {
  apiUrl: string;
  user?: string;
  password?: string;
  protocol?: ProxyProtocol;
  timeoutMs?: number;
  now?: () => number;
}

/**
 * Vendor extraction API: `GET apiUrl?num=N` answering
 * `{ code: 0, data: { proxy_list: ["ip:port,ttlSeconds"] } }`.
 */
export class HttpProxyProvider implements ProxyProvider {
  readonly name = 'http';
  private readonly http: AxiosInstance;
  private readonly now: () => number;

  constructor(
    private readonly options: HttpProxyProviderOptions,
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
    this.now = options.now ?? Date.now;
  }

  async fetchProxies(count: number): Promise<ProxyEndpoint[]> {
    const response = await this.http.get<string>(this.options.apiUrl, { params: { num: count } });
    if (response.status !== 200) {
      throw ScraperErrors.providerError(`Proxy API answered HTTP ${response.status}`, {
        statusCode: response.status,
      });
    }

    let body: unknown;
    try {
      body = safeJsonParse(String(response.data));
    } catch (error: unknown) {
      throw ScraperErrors.providerError(
        'Proxy API returned malformed JSON',
        undefined,
        error instanceof Error ? error : undefined,
      );
    }

    const parsed = extractionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw ScraperErrors.providerError('Proxy API response has an unexpected shape');
    }
    if (parsed.data.code !== 0) {
      throw ScraperErrors.providerError(`Proxy API error ${parsed.data.code}: ${parsed.data.msg ?? ''}`, {
        providerCode: parsed.data.code,
      });
    }

    const endpoints: ProxyEndpoint[] = [];
    for (const entry of parsed.data.data?.proxy_list ?? []) {
      const endpoint = this.parseEntry(entry.trim());
      if (endpoint) endpoints.push(endpoint);
      else logger.warn(`Skipping unparseable proxy entry: ${entry}`);
    }
    return endpoints;
  }

  async markInvalid(): Promise<void> {
    // extraction APIs expire endpoints on their own
  }

  parseEntry(entry: string): ProxyEndpoint | null {
    const match = PROXY_ENTRY_PATTERN.exec(entry);
    if (!match) return null;
    const ttlSeconds = parseInt(match[3], 10);
    return createProxyEndpoint({
      host: match[1],
      port: parseInt(match[2], 10),
      user: this.options.user,
      password: this.options.password,
      protocol: this.options.protocol,
      expiresAt: this.now() + (ttlSeconds - EXPIRY_SAFETY_MARGIN_SECONDS) * 1000,
    });
  }
}

export interface FileProxyProviderOptions {
  proxyDir: string;
  ttlSeconds: number;
  protocol?: ProxyProtocol;
  now?: () => number;
}

interface ProxyLine {
  id: string;
  host: string;
  port: number;
  user: string;
  password: string;
}

/**
 * Static list from `*.txt` files, one `host:port:user:pass` (or `host:port`) per line.
 * Endpoints are handed out round-robin; invalidated ones are never handed out again.
 */
export class FileProxyProvider implements ProxyProvider {
  readonly name = 'file';
  private lines: ProxyLine[] | null = null;
  private cursor = 0;
  private readonly retired = new Set<string>();
  private readonly now: () => number;

  constructor(private readonly options: FileProxyProviderOptions) {
    this.now = options.now ?? Date.now;
  }

  async fetchProxies(count: number): Promise<ProxyEndpoint[]> {
    const usable = this.readLines().filter((line) => !this.retired.has(line.id));
    if (usable.length === 0) return [];

    const picked: ProxyEndpoint[] = [];
    const take = Math.min(count, usable.length);
    for (let i = 0; i < take; i++) {
      const line = usable[(this.cursor + i) % usable.length];
      picked.push(
        createProxyEndpoint({
          host: line.host,
          port: line.port,
          user: line.user,
          password: line.password,
          protocol: this.options.protocol,
          expiresAt: this.now() + this.options.ttlSeconds * 1000,
        }),
      );
    }
    this.cursor = (this.cursor + take) % usable.length;
    return picked;
  }

  async markInvalid(endpoint: ProxyEndpoint): Promise<void> {
    this.retired.add(`${endpoint.host}:${endpoint.port}`);
  }

  private readLines(): ProxyLine[] {
    if (this.lines) return this.lines;

    if (!fs.existsSync(this.options.proxyDir)) {
      throw ScraperErrors.providerError(`Proxy directory not found: ${this.options.proxyDir}`);
    }

    const lines: ProxyLine[] = [];
    const files = fs.readdirSync(this.options.proxyDir).filter((f) => f.endsWith('.txt')).sort();
    for (const file of files) {
      const content = fs.readFileSync(path.join(this.options.proxyDir, file), 'utf-8');
      for (const raw of content.split('\n')) {
        const line = raw.trim();
        if (line.length === 0 || line.startsWith('#')) continue;
        const parsed = parseProxyLine(line);
        if (!parsed) {
          logger.warn(`Skipping invalid proxy format: ${line}`, { file });
          continue;
        }
        if (!lines.some((l) => l.id === parsed.id)) lines.push(parsed);
      }
    }

    logger.info(`Loaded ${lines.length} proxies from ${files.length} file(s)`);
    this.lines = lines;
    return lines;
  }
}

function parseProxyLine(line: string): ProxyLine | null {
  const parts = line.split(':').map((part) => part.trim());
  if (parts.length !== 2 && parts.length !== 4) return null;
  const [host, portText, user = '', password = ''] = parts;
  const port = parseInt(portText, 10);
  if (!host || !Number.isInteger(port) || port <= 0 || port > 65535) return null;
  return { id: `${host}:${port}`, host, port, user, password };
}
