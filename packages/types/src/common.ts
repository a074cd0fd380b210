/** 브랜드 타입 -- 원시 타입에 의미론적 구분 부여 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

/** 결과 타입 -- 에러 핸들링의 명시적 표현 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

/** 로그 레벨 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** 성공 Result 생성 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/** 실패 Result 생성 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}
