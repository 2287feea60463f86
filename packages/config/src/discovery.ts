import {
  DEFAULT_ENTRY_POINT_GROUP,
  DEFAULT_REGISTER_FUNCTION,
  LOCATOR_STRATEGIES,
  isLogLevel,
  type LocatorStrategy,
  type LogLevel,
} from '@plugin-atlas/shared';

export interface DiscoveryConfig {
  /** 활성 가상환경 루트 (파라미터 탐색 2순위, entry_points.txt 조회) */
  virtualEnv: string | null;
  logLevel: LogLevel;
  strategy: LocatorStrategy;
  entryPointGroup: string;
  registerFunction: string;
}

type Env = Record<string, string | undefined>;

function isLocatorStrategy(value: string): value is LocatorStrategy {
  return LOCATOR_STRATEGIES.some((strategy) => strategy === value);
}

function readTrimmed(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

/**
 * 환경변수에서 추출 설정 로드
 * 잘못된 값은 에러 대신 기본값으로 대체
 */
export const loadDiscoveryConfig = (env: Env = process.env): DiscoveryConfig => {
  const logLevel = readTrimmed(env, 'PLUGIN_ATLAS_LOG_LEVEL')?.toLowerCase() ?? 'warn';
  const strategy = readTrimmed(env, 'PLUGIN_ATLAS_STRATEGY')?.toLowerCase() ?? 'auto';

  return {
    virtualEnv: readTrimmed(env, 'VIRTUAL_ENV'),
    logLevel: isLogLevel(logLevel) ? logLevel : 'warn',
    strategy: isLocatorStrategy(strategy) ? strategy : 'auto',
    entryPointGroup: readTrimmed(env, 'PLUGIN_ATLAS_ENTRY_POINT_GROUP') ?? DEFAULT_ENTRY_POINT_GROUP,
    registerFunction: readTrimmed(env, 'PLUGIN_ATLAS_REGISTER_FUNCTION') ?? DEFAULT_REGISTER_FUNCTION,
  };
};
