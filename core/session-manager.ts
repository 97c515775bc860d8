import { CredentialSource } from './cookie-manager';
import { ScraperErrors } from './errors';
import {
  createCredential,
  Credential,
  CredentialStatus,
  invalidatedCredential,
} from './models';
import { createEnhancedLogger } from '../utils/logger';

const logger = createEnhancedLogger('CredentialPool');

/**
 * CredentialPool - 账号池
 * 按加载顺序线性扫描可用账号；失效只在内存中记录，不回写来源
 */
export class CredentialPool {
  private credentials: Credential[] = [];
  private nextId = 1;

  constructor(
    private readonly source: CredentialSource,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * 从来源加载账号
   * A reload keeps the INVALID status of a credential whose cookie is unchanged; a refreshed
   * cookie under the same name comes back ACTIVE with a new id.
   */
  async load(): Promise<void> {
    const records = await this.source.load();
    const previous = new Map(this.credentials.map((c) => [c.name, c]));

    this.credentials = records.map((record) => {
      const prior = previous.get(record.name);
      if (prior && prior.cookie === record.cookie) {
        return prior;
      }
      return createCredential({
        id: this.nextId++,
        name: record.name,
        cookie: record.cookie,
        userAgent: record.userAgent,
      });
    });

    logger.info(`Loaded ${this.credentials.length} credential(s)`, { active: this.activeCount() });
  }

  /**
   * 获取第一个可用账号，找不到时重新加载一次
   */
  async acquireActive(): Promise<Credential> {
    const found = this.findActive();
    if (found) return found;

    logger.warn('No active credential in memory, reloading from source');
    await this.load();

    const reloaded = this.findActive();
    if (reloaded) return reloaded;
    throw ScraperErrors.noActiveCredential();
  }

  /**
   * 标记账号失效；重复调用无副作用
   * @returns whether the credential changed state
   */
  invalidate(credential: Credential): boolean {
    const index = this.credentials.findIndex((c) => c.id === credential.id);
    if (index < 0) return false;

    const current = this.credentials[index];
    if (current.status === CredentialStatus.INVALID) return false;

    this.credentials[index] = invalidatedCredential(current, this.now());
    logger.warn(`Credential ${current.name} marked INVALID`, {
      credentialId: current.id,
      remaining: this.activeCount(),
    });
    return true;
  }

  get(id: number): Credential | undefined {
    return this.credentials.find((c) => c.id === id);
  }

  getAll(): readonly Credential[] {
    return [...this.credentials];
  }

  activeCount(): number {
    return this.credentials.filter((c) => c.status === CredentialStatus.ACTIVE).length;
  }

  private findActive(): Credential | undefined {
    return this.credentials.find((c) => c.status === CredentialStatus.ACTIVE);
  }
}
