// @cardlane/switcher — barrel export

// 타입
export type {
  PriorValue,
  OverrideTarget,
  KeySource,
  KeyResolution,
  DesiredValue,
  OverrideRecord,
  RevertOutcome,
} from './types.js';

// 에러
export {
  OverrideError,
  MemoryCardError,
  type OverrideErrorKind,
  type OverrideErrorCode,
  type MemoryCardErrorCode,
} from './errors.js';

// 세션
export { createInMemorySlotStore, type OverrideSlotStore } from './slot-store.js';
export { MEMORY_CARD_KEYS, SLOT_ENABLE_KEYS, resolveKey } from './key-resolution.js';
export {
  createOverrideSession,
  type OverrideSession,
  type OverrideSessionDeps,
} from './override-session.js';

// 메모리 카드
export { isPathLike, resolveWriteFileNameOnly } from './card-value.js';
export {
  PS2_PLATFORM_NAME,
  DEFAULT_CARD_EXTENSION,
  MemoryCardCreationResult,
  getSafeFileName,
  buildMemoryCardFileName,
  getTemplateExtension,
  createMemoryCardManager,
  type GameLibrary,
  type PlatformResolver,
  type MemoryCardManager,
  type MemoryCardManagerDeps,
} from './memory-cards.js';

// 스위처 / 수명주기
export {
  createMemoryCardSwitcher,
  type MemoryCardSwitcher,
  type MemoryCardSwitcherDeps,
  type SwitchOutcome,
  type SwitchSkipReason,
} from './switcher.js';
export { bindSwitcherLifecycle, type GameLifecycleEvents } from './lifecycle.js';
export { createCardlane, type Cardlane, type CardlaneDeps } from './plugin.js';
