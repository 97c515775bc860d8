/**
 * Utils Module Exports
 * 统一导出工具模块
 */

export * from './async';
export { RetryPolicy, type RetryPolicyOptions } from './retry';
export {
  type ConfigOverrides,
  type CrawlerConfig,
  ConfigManager,
} from './config-manager';
export {
  closeLogger,
  createEnhancedLogger,
  createModuleLogger,
  EnhancedLogger,
  LOG_LEVELS,
  type LogContext,
  type LogLevel,
  logger,
  type ModuleLogger,
  setLogLevel,
} from './logger';
export {
  isJsonRecord,
  type SafeParseOptions,
  safeJsonParse,
  safeJsonParseSafe,
} from './safe-json';
