/**
 * Cookie 凭据来源
 * 从 cookies 目录加载账号 Cookie，供 CredentialPool 使用
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { createEnhancedLogger } from '../utils/logger';
import { safeJsonParse } from '../utils/safe-json';
import { ScraperErrors } from './errors';

const logger = createEnhancedLogger('CookieManager');

export interface CredentialRecord {
  name: string;
  cookie: string;
  userAgent?: string;
}

export interface CredentialSource {
  /** Reads every credential the source currently holds, in a stable order. */
  load(): Promise<CredentialRecord[]>;
}

const cookieEntrySchema = z
  .object({
    name: z.string().min(1),
    value: z.string(),
  })
  .passthrough();

const cookieFileSchema = z.object({
  name: z.string().min(1).optional(),
  userAgent: z.string().min(1).optional(),
  cookies: z.union([z.string().min(1), z.array(cookieEntrySchema).min(1)]),
});

export type CookieFile = z.infer<typeof cookieFileSchema>;

export function toCookieHeader(cookies: CookieFile['cookies']): string {
  if (typeof cookies === 'string') return cookies.trim();
  return cookies.map((c) => `${c.name}=${c.value}`).join('; ');
}

/**
 * 解析单个 Cookie 文件内容
 */
export function parseCookieFile(content: string, fallbackName: string): CredentialRecord {
  const parsed = cookieFileSchema.safeParse(safeJsonParse(content));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw ScraperErrors.validationError(
      `Invalid cookie file ${fallbackName}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown'}`,
    );
  }
  return {
    name: parsed.data.name ?? fallbackName,
    cookie: toCookieHeader(parsed.data.cookies),
    userAgent: parsed.data.userAgent,
  };
}

/**
 * 扫描 cookies 目录下的 *.json 文件，按文件名排序
 */
export class FileCredentialSource implements CredentialSource {
  constructor(private readonly cookiesDir: string) {}

  async load(): Promise<CredentialRecord[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.cookiesDir);
    } catch (error: unknown) {
      throw ScraperErrors.sourceUnavailable(
        `Cookies directory not readable: ${this.cookiesDir}`,
        { path: this.cookiesDir },
        error instanceof Error ? error : undefined,
      );
    }

    const records: CredentialRecord[] = [];
    for (const file of files.filter((f) => f.endsWith('.json')).sort()) {
      const filePath = path.join(this.cookiesDir, file);
      try {
        const content = await fs.readFile(filePath, 'utf-8');
        records.push(parseCookieFile(content, path.basename(file, '.json')));
      } catch (error: unknown) {
        logger.warn(`Skipping cookie file ${file}`, {
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    logger.info(`Loaded ${records.length} credential(s) from ${this.cookiesDir}`);
    return records;
  }
}

export class StaticCredentialSource implements CredentialSource {
  constructor(private readonly records: readonly CredentialRecord[]) {}

  async load(): Promise<CredentialRecord[]> {
    return this.records.map((record) => ({ ...record }));
  }
}
