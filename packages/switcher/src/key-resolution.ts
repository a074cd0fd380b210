// packages/switcher/src/key-resolution.ts
import {
  findCandidateKeyInDocument,
  readIniFile,
  readValueFromDocument,
  type IniDocument,
} from '@cardlane/ini';
import type { KeyResolutionPolicy } from '@cardlane/types';
import type { KeyResolution } from './types.js';

/** 메모리 카드 경로를 담는 키 (PCSX2 1.7+ / 레거시) */
export const MEMORY_CARD_KEYS = ['Slot1_Filename', 'Mcd001'] as const;

/** 슬롯 활성화 키 */
export const SLOT_ENABLE_KEYS = ['Slot1_Enable'] as const;

/**
 * 정식 키 결정
 *
 * 파일은 한 번만 읽는다. 아무 키도 찾지 못하면 첫 번째 후보
 * (후보가 없으면 설정된 키)에 이전 값 없음으로 쓴다.
 */
export function resolveKey(
  configPath: string,
  section: string,
  configuredKey: string,
  candidates: readonly string[],
  policy: KeyResolutionPolicy,
): KeyResolution {
  const defaultKey = candidates[0] ?? configuredKey;
  const read = readIniFile(configPath);
  if (!read.ok) {
    return fallback(defaultKey);
  }

  const doc = read.value;
  if (policy === 'discovered-first') {
    return (
      discover(doc, section, candidates) ??
      configured(doc, section, configuredKey) ??
      fallback(defaultKey)
    );
  }
  return (
    configured(doc, section, configuredKey) ??
    discover(doc, section, candidates) ??
    fallback(defaultKey)
  );
}

function configured(doc: IniDocument, section: string, key: string): KeyResolution | undefined {
  const lookup = readValueFromDocument(doc, section, key);
  if (!lookup.found) {
    return undefined;
  }
  return { key, source: 'configured', prior: { found: true, value: lookup.value } };
}

function discover(
  doc: IniDocument,
  section: string,
  candidates: readonly string[],
): KeyResolution | undefined {
  const candidate = findCandidateKeyInDocument(doc, section, candidates);
  if (!candidate.found) {
    return undefined;
  }
  // 파일에 적힌 철자 그대로 사용
  const lookup = readValueFromDocument(doc, section, candidate.key);
  return {
    key: candidate.key,
    source: 'discovered',
    prior: lookup.found ? { found: true, value: lookup.value } : { found: false },
  };
}

function fallback(key: string): KeyResolution {
  return { key, source: 'fallback', prior: { found: false } };
}
