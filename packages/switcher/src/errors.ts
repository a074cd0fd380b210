// packages/switcher/src/errors.ts
import { CardlaneError } from '@cardlane/infra';

export type OverrideErrorKind =
  | 'validation' // 대상 설정 누락
  | 'io' // 정식 키 쓰기 실패
  | 'producer'; // 값 생성기 실패

export type OverrideErrorCode = 'OVERRIDE_VALIDATION' | 'OVERRIDE_IO' | 'OVERRIDE_PRODUCER';

const CODE_BY_KIND: Record<OverrideErrorKind, OverrideErrorCode> = {
  validation: 'OVERRIDE_VALIDATION',
  io: 'OVERRIDE_IO',
  producer: 'OVERRIDE_PRODUCER',
};

/** apply 실패: 슬롯은 변경되지 않은 상태 */
export class OverrideError extends CardlaneError {
  declare readonly code: OverrideErrorCode;
  readonly kind: OverrideErrorKind;

  constructor(
    message: string,
    kind: OverrideErrorKind,
    opts?: { cause?: Error; details?: Record<string, unknown> },
  ) {
    super(message, CODE_BY_KIND[kind], opts);
    this.name = 'OverrideError';
    this.kind = kind;
  }
}

export type MemoryCardErrorCode = 'MEMORY_CARD_TEMPLATE_INVALID' | 'MEMORY_CARD_COPY_FAILED';

/** 메모리 카드 파일 생성 실패 */
export class MemoryCardError extends CardlaneError {
  declare readonly code: MemoryCardErrorCode;

  constructor(
    message: string,
    code: MemoryCardErrorCode,
    opts?: { cause?: Error; details?: Record<string, unknown> },
  ) {
    super(message, code, opts);
    this.name = 'MemoryCardError';
  }
}
