// packages/switcher/src/slot-store.ts
import type { OverrideRecord } from './types.js';

/**
 * 오버라이드 기록 슬롯
 *
 * 한 번에 하나의 기록만 보관한다. 새 set은 이전 기록을 덮어쓴다.
 */
export interface OverrideSlotStore {
  get(): OverrideRecord | undefined;
  set(record: OverrideRecord): void;
  clear(): void;
}

export function createInMemorySlotStore(): OverrideSlotStore {
  let slot: OverrideRecord | undefined;

  return {
    get() {
      return slot;
    },
    set(record) {
      slot = record;
    },
    clear() {
      slot = undefined;
    },
  };
}
