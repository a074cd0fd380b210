// packages/infra/src/errors.ts

/** cardlane 기본 에러: 모든 커스텀 에러의 상위 클래스 */
export class CardlaneError extends Error {
  readonly code: string;
  readonly isOperational: boolean;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    opts: {
      isOperational?: boolean;
      cause?: Error;
      details?: Record<string, unknown>;
    } = {},
  ) {
    super(message, { cause: opts.cause });
    this.name = 'CardlaneError';
    this.code = code;
    this.isOperational = opts.isOperational ?? true;
    this.details = opts.details;
  }
}

// ──────────────────────────────────────────────
// 도메인 에러 co-location 원칙:
//   IniError      → packages/ini/src/errors.ts
//   SettingsError → packages/config/src/errors.ts
//   OverrideError → packages/switcher/src/errors.ts
// ──────────────────────────────────────────────

/** 타입 가드 */
export function isCardlaneError(err: unknown): err is CardlaneError {
  return err instanceof CardlaneError;
}

/** unknown → Error 정규화 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/** Node 파일시스템 에러 코드 추출 (ENOENT 등) */
export function getErrnoCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) {
    return undefined;
  }
  return typeof err.code === 'string' ? err.code : undefined;
}

/** 에러 객체에서 구조화된 정보 추출 */
export function extractErrorInfo(err: unknown): {
  code: string;
  message: string;
  isOperational?: boolean;
  stack?: string;
  cause?: string;
} {
  if (err instanceof CardlaneError) {
    return {
      code: err.code,
      message: err.message,
      isOperational: err.isOperational,
      stack: err.stack,
      cause: err.cause instanceof Error ? err.cause.message : undefined,
    };
  }
  if (err instanceof Error) {
    return { code: getErrnoCode(err) ?? 'UNKNOWN', message: err.message, stack: err.stack };
  }
  return { code: 'UNKNOWN', message: String(err) };
}
