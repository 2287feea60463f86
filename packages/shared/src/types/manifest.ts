/**
 * 플러그인 manifest 타입 정의
 * 내부 모델(camelCase, variant)과 소비측에 넘기는 JSON 형태(snake_case)를 분리
 */
import type {
  CallableType,
  JsonValue,
  PluginKind,
  PluginTypeWire,
  UpgradeCategory,
  UpgradeTypeWire,
} from './index';

// === 내부 모델 ===

/** 로컬 심볼이 가리키는 (모듈 경로, 원래 이름) */
export interface SymbolReference {
  module: string;
  name: string;
}

/** 파일 하나에서 만든 import 심볼 테이블 (생성 후 불변) */
export type SymbolTable = ReadonlyMap<string, Readonly<SymbolReference>>;

/** 생성자/함수 파라미터 서술자 */
export interface ParameterDescriptor {
  annotation?: string;
  /** JSON 텍스트로 직렬화된 기본값 (예: "null", "5", "\"base\"") */
  default?: string;
  required: boolean;
}

/** (모듈, 이름)으로 식별되는 callable */
export interface CallableDescriptor {
  module: string;
  name: string;
  type: CallableType;
  returnAnnotation?: string;
  parameters: Record<string, ParameterDescriptor>;
}

/** 데코레이터로 선언된 마이그레이션 스텝 */
export interface UpgradeStep {
  name: string;
  target: CallableDescriptor;
  targetVersion: string;
  category: UpgradeCategory;
  priority: number;
  minVersion?: string;
  maxVersion?: string;
}

/** 등록 호출 하나에서 복원한 플러그인 */
export interface PluginRecord {
  name: string;
  kind: PluginKind;
  obj: CallableDescriptor;
  callMethod?: string;
  description?: string;
  config?: CallableDescriptor;
  ioType?: string;
  requiresStore?: boolean;
  versionStrategy?: JsonValue;
  versionReader?: JsonValue;
  upgradeSteps?: UpgradeStep[];
}

/** 패키지 단위 추출 결과 */
export interface PackageManifest {
  name: string;
  plugins: PluginRecord[];
  metadata: Record<string, JsonValue>;
}

// === manifest JSON (소비측 데이터 계약) ===

export interface ParameterJson {
  annotation?: string;
  default?: string;
  required: boolean;
}

export interface CallableJson {
  module: string;
  name: string;
  type: CallableType;
  return_annotation: string | null;
  parameters: Record<string, ParameterJson>;
}

export interface ConfigJson {
  module: string;
  name: string;
  return_annotation: string | null;
  parameters: Record<string, ParameterJson>;
}

export interface UpgradeStepJson {
  name: string;
  func: CallableJson;
  target_version: string;
  upgrade_type: UpgradeTypeWire;
  priority: number;
  min_version?: string;
  max_version?: string;
}

export interface PluginJson {
  name: string;
  plugin_type: PluginTypeWire;
  obj: CallableJson;
  call_method?: string;
  description?: string;
  config?: ConfigJson;
  io_type?: string;
  requires_store?: boolean;
  version_strategy?: JsonValue;
  version_reader?: JsonValue;
  upgrade_steps?: UpgradeStepJson[];
}

export interface PackageManifestJson {
  name: string;
  plugins: PluginJson[];
  metadata: Record<string, JsonValue>;
}
