// 플러그인 종류 - 등록 생성자에서 한 번만 결정되는 닫힌 variant
export const PLUGIN_KINDS = ['Parser', 'Exporter', 'Modifier', 'Upgrader', 'Utility'] as const;

// 업그레이드 스텝 카테고리 (File: 파일 직접 변경 / System: 데이터 변환)
export const UPGRADE_CATEGORIES = ['File', 'System', 'Unknown'] as const;

// Call Locator 전략
export const LOCATOR_STRATEGIES = ['auto', 'tree', 'text'] as const;

// 로그 레벨 (낮은 순)
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

// PluginKind → manifest JSON의 plugin_type 값
// Modifier는 소비측 discriminator에 맞춰 'function'으로 직렬화
export const PLUGIN_TYPE_WIRE = Object.freeze({
  Parser: 'parser',
  Exporter: 'exporter',
  Modifier: 'function',
  Upgrader: 'upgrader',
  Utility: 'utility',
} as const);

// UpgradeCategory → upgrade_type 값
export const UPGRADE_TYPE_WIRE = Object.freeze({
  File: 'FILE',
  System: 'SYSTEM',
  Unknown: 'UNKNOWN',
} as const);

// 인식하는 등록 생성자 이름 → PluginKind
export const PLUGIN_CONSTRUCTORS: ReadonlyMap<string, (typeof PLUGIN_KINDS)[number]> = new Map([
  ['ParserPlugin', 'Parser'],
  ['ExporterPlugin', 'Exporter'],
  ['UpgraderPlugin', 'Upgrader'],
  ['BasePlugin', 'Modifier'],
  ['ModifierPlugin', 'Modifier'],
  ['UtilityPlugin', 'Utility'],
  ['PluginSpec.parser', 'Parser'],
  ['PluginSpec.exporter', 'Exporter'],
  ['PluginSpec.function', 'Modifier'],
  ['PluginSpec.upgrader', 'Upgrader'],
  ['PluginSpec.utility', 'Utility'],
]);

// 고정 enum 표현식 → canonical 소문자 값
export const ENUM_VALUES: ReadonlyMap<string, string> = new Map([
  ['IOType.STDOUT', 'stdout'],
  ['IOType.STDIN', 'stdin'],
  ['IOType.BOTH', 'both'],
  ['UpgradeType.FILE', 'file'],
  ['UpgradeType.SYSTEM', 'system'],
]);

// 데코레이터 스캔으로 라우팅되는 예약 속성명 (ClassName.steps)
export const DECORATED_ATTRIBUTES: ReadonlySet<string> = new Set(['steps']);

// 데코레이터 이름: @ClassName.register_step(...)
export const STEP_DECORATOR = 'register_step';

// 재귀 탐색 시 무시할 디렉토리 이름 (숨김 항목은 별도로 제외)
export const IGNORE_DIRS: ReadonlySet<string> = new Set([
  '__pycache__', 'venv', 'env', 'node_modules', 'build', 'dist',
]);

// 등록 파일 후보 (우선순위 순)
export const ENTRY_FILE_CANDIDATES = ['plugins.py', 'plugin.py'] as const;

export const DEFAULT_REGISTER_FUNCTION = 'register_plugin';
export const DEFAULT_PLUGINS_KEYWORD = 'plugins';
export const DEFAULT_ENTRY_POINT_GROUP = 'r2x_plugin';
export const DEFAULT_STEP_PRIORITY = 100;
export const DEFAULT_TARGET_VERSION = 'unknown';
