// packages/infra/src/env.ts
const CARDLANE_PREFIX = 'CARDLANE_';

/**
 * 환경 변수 조회
 *
 * CARDLANE_ 접두사를 우선 검색하고, 없으면 접두사 없는 키를 검색.
 * 빈 문자열은 미설정으로 취급.
 */
export function getEnv(
  key: string,
  fallback?: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  return nonEmpty(env[`${CARDLANE_PREFIX}${key}`]) ?? nonEmpty(env[key]) ?? fallback;
}

/** truthy 환경 변수 판별 ('1', 'true', 'yes') */
export function isTruthyEnvValue(value: string | undefined): boolean {
  return value != null && ['1', 'true', 'yes'].includes(value.toLowerCase());
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === '' ? undefined : value;
}
