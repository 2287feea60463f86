/**
 * 정적 추출 에러 분류
 * NotFound / InvalidSyntax / UnsupportedConstruct 세 가지로 구분
 */

export type DiscoveryErrorKind = 'NotFound' | 'InvalidSyntax' | 'UnsupportedConstruct';

/** 모든 추출 에러의 기반 클래스 */
export class DiscoveryError extends Error {
  public readonly kind: DiscoveryErrorKind;
  public readonly cause?: unknown;

  constructor(kind: DiscoveryErrorKind, message: string, cause?: unknown) {
    super(message);
    this.name = 'DiscoveryError';
    this.kind = kind;
    this.cause = cause;
  }
}

/** 등록 파일, 등록 섹션, 데코레이터, 정의 파일이 없음 */
export class NotFoundError extends DiscoveryError {
  constructor(message: string, cause?: unknown) {
    super('NotFound', message, cause);
    this.name = 'NotFoundError';
  }
}

/** 호출/임포트 텍스트가 깨져 있음 */
export class InvalidSyntaxError extends DiscoveryError {
  constructor(message: string, cause?: unknown) {
    super('InvalidSyntax', message, cause);
    this.name = 'InvalidSyntaxError';
  }
}

/** 런타임 없이 평가할 수 없는 구문 (속성 체인, 리스트 내용 등) */
export class UnsupportedConstructError extends DiscoveryError {
  constructor(message: string, cause?: unknown) {
    super('UnsupportedConstruct', message, cause);
    this.name = 'UnsupportedConstructError';
  }
}

export function isDiscoveryError(error: unknown, kind?: DiscoveryErrorKind): error is DiscoveryError {
  if (!(error instanceof DiscoveryError)) return false;
  return kind === undefined || error.kind === kind;
}

/** unknown 에러에서 메시지 추출 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
