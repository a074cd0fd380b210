import type { LogLevel } from './common.js';
import type { PlatformId } from './game.js';

/**
 * 정식 키 결정 정책
 *
 * - configured-first: 설정된 키가 파일에 있으면 그대로 사용, 없을 때만 후보 탐색
 * - discovered-first: 후보 탐색 결과를 먼저 사용, 없으면 설정된 키
 */
export type KeyResolutionPolicy = 'configured-first' | 'discovered-first';

/** 메모리 카드 스위처 설정 (설정 파일에 저장되는 단위) */
export interface SwitcherSettings {
  /** 대상 플랫폼 (비어 있으면 이름으로 자동 탐지) */
  platformId?: PlatformId;
  templateMemoryCardPath: string;
  outputFolderPath: string;
  enableAutoSwitch: boolean;
  restoreOnExit: boolean;
  autoCreateMissingCard: boolean;
  writeFileNameOnly: boolean;
  pcsx2ConfigPath: string;
  pcsx2IniSection: string;
  pcsx2IniKey: string;
  keyResolution: KeyResolutionPolicy;
  logging: {
    level: LogLevel;
  };
}
