import type {
  PLUGIN_KINDS,
  UPGRADE_CATEGORIES,
  LOCATOR_STRATEGIES,
  LOG_LEVELS,
  PLUGIN_TYPE_WIRE,
  UPGRADE_TYPE_WIRE,
} from '../constants/index';

// === 기본 유틸리티 타입 ===

/** 배열 타입에서 원소 타입 추출 */
export type ArrayElement<T extends readonly unknown[]> = T[number];

/** 플러그인 종류 유니온 */
export type PluginKind = ArrayElement<typeof PLUGIN_KINDS>;

/** 업그레이드 스텝 카테고리 유니온 */
export type UpgradeCategory = ArrayElement<typeof UPGRADE_CATEGORIES>;

/** Call Locator 전략 유니온 */
export type LocatorStrategy = ArrayElement<typeof LOCATOR_STRATEGIES>;

/** 로그 레벨 유니온 */
export type LogLevel = ArrayElement<typeof LOG_LEVELS>;

/** manifest JSON의 plugin_type 값 */
export type PluginTypeWire = (typeof PLUGIN_TYPE_WIRE)[PluginKind];

/** manifest JSON의 upgrade_type 값 */
export type UpgradeTypeWire = (typeof UPGRADE_TYPE_WIRE)[UpgradeCategory];

export type CallableType = 'class' | 'function';

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export * from './manifest';
