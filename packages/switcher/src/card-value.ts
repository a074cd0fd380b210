import type { PriorValue } from './types.js';

/** 경로 구분자(\ /) 또는 드라이브 구분자(:)를 포함하면 경로로 본다 */
export function isPathLike(value: string): boolean {
  return /[\\/:]/.test(value);
}

/**
 * 파일 이름만 쓸지 결정
 *
 * 설정이 켜져 있으면 항상, 아니면 기존 값이 비어 있지 않은 파일 이름일 때.
 */
export function resolveWriteFileNameOnly(writeFileNameOnly: boolean, prior: PriorValue): boolean {
  if (writeFileNameOnly) {
    return true;
  }
  if (!prior.found || prior.value.trim() === '') {
    return false;
  }
  return !isPathLike(prior.value);
}
