import type { KeyResolutionPolicy, Result } from '@cardlane/types';

/** 덮어쓰기 전 값: 빈 값으로 존재하는 것과 없는 것을 구분 */
export type PriorValue = { found: true; value: string } | { found: false };

/** apply 대상 */
export interface OverrideTarget {
  configPath: string;
  section: string;
  /** 설정된 키 이름 */
  key: string;
  /** 같은 값을 뜻하는 대체 키 (앞쪽 우선) */
  candidateKeys: readonly string[];
  /** 발견되면 "true"로 맞출 활성화 키 */
  enableKeys: readonly string[];
  /** 미지정 시 세션 기본 정책 */
  policy?: KeyResolutionPolicy;
}

export type KeySource = 'configured' | 'discovered' | 'fallback';

/** 정식 키 결정 결과 */
export interface KeyResolution {
  key: string;
  source: KeySource;
  prior: PriorValue;
}

/** 원하는 값: 리터럴 또는 결정된 키를 보고 값을 만드는 생성기 */
export type DesiredValue = string | ((resolution: KeyResolution) => Result<string, string>);

/** 세션 슬롯에 남는 기록 */
export interface OverrideRecord {
  readonly sessionId: string;
  readonly configPath: string;
  readonly section: string;
  readonly key: string;
  readonly prior: PriorValue;
  readonly value: string;
}

export type RevertOutcome =
  | 'idle'
  | 'mismatch'
  | 'nothing-to-restore'
  | 'incomplete-record'
  | 'restored'
  | 'restore-failed';
