/**
 * 커맨드 공통 실행 컨텍스트: 환경 설정 + stderr 로거
 */
import { loadDiscoveryConfig, type DiscoveryConfig } from '@plugin-atlas/config';
import { createLogger, stderrSink, type Logger } from '@plugin-atlas/shared';

export interface CommandContext {
  config: DiscoveryConfig;
  logger: Logger;
}

export function createCommandContext(scope: string, verbose = false): CommandContext {
  const config = loadDiscoveryConfig();
  const logger = createLogger(scope, verbose ? 'debug' : config.logLevel, stderrSink);
  return { config, logger };
}
