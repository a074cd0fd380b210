// packages/config/src/defaults.ts
import { createPlatformId, type SwitcherSettings } from '@cardlane/types';
import type { UserSettings } from './zod-schema.js';

/**
 * 불변 기본값
 *
 * 섹션/키 기본값은 PCSX2 1.7+ 의 `[MemoryCards] Slot1_Filename`.
 */
const DEFAULTS = Object.freeze({
  templateMemoryCardPath: '',
  outputFolderPath: '',
  enableAutoSwitch: false,
  restoreOnExit: true,
  autoCreateMissingCard: false,
  writeFileNameOnly: false,
  pcsx2ConfigPath: '',
  pcsx2IniSection: 'MemoryCards',
  pcsx2IniKey: 'Slot1_Filename',
  keyResolution: 'configured-first' as const,
  logging: Object.freeze({ level: 'info' as const }),
}) satisfies SwitcherSettings;

/** 기본값을 유저 설정에 병합 (유저 값 우선) */
export function applyDefaults(user: UserSettings): SwitcherSettings {
  const { platformId, logging, ...rest } = user;
  return {
    ...DEFAULTS,
    ...rest,
    ...(platformId ? { platformId: createPlatformId(platformId) } : {}),
    logging: { ...DEFAULTS.logging, ...logging },
  };
}

/** 기본값 조회 (읽기 전용) */
export function getDefaults(): Readonly<SwitcherSettings> {
  return DEFAULTS;
}
