import type { KeyResolutionPolicy } from '@cardlane/types';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MEMORY_CARD_KEYS, resolveKey } from '../src/key-resolution.js';
import { createTempDir, writeFile } from './helpers.js';

const BOTH_KEYS = '[MemoryCards]\nMcd001=a.ps2\nSlot1_Filename=b.ps2\n';

const resolve = (ini: string, key: string, policy: KeyResolutionPolicy) =>
  resolveKey(ini, 'MemoryCards', key, MEMORY_CARD_KEYS, policy);

describe('resolveKey', () => {
  let tmp: ReturnType<typeof createTempDir>;

  beforeEach(() => {
    tmp = createTempDir();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  describe('configured-first', () => {
    it('설정된 키가 있으면 그 키를 쓴다', () => {
      const ini = writeFile(tmp.dir, 'PCSX2.ini', BOTH_KEYS);
      expect(resolve(ini, 'Slot1_Filename', 'configured-first')).toEqual({
        key: 'Slot1_Filename',
        source: 'configured',
        prior: { found: true, value: 'b.ps2' },
      });
    });

    it('설정된 키가 없으면 후보 키를 파일 철자로 찾는다', () => {
      const ini = writeFile(tmp.dir, 'PCSX2.ini', '[MemoryCards]\nmcd001=x.ps2\n');
      expect(resolve(ini, 'Slot1_Filename', 'configured-first')).toEqual({
        key: 'mcd001',
        source: 'discovered',
        prior: { found: true, value: 'x.ps2' },
      });
    });

    it('빈 값도 이전 값으로 기록한다', () => {
      const ini = writeFile(tmp.dir, 'PCSX2.ini', '[MemoryCards]\nSlot1_Filename=\n');
      expect(
        resolve(ini, 'Slot1_Filename', 'configured-first').prior,
      ).toEqual({ found: true, value: '' });
    });

    it('아무것도 없으면 설정된 키로 fallback', () => {
      const ini = writeFile(tmp.dir, 'PCSX2.ini', '[Other]\nSlot1_Filename=z.ps2\n');
      expect(resolve(ini, 'Slot1_Filename', 'configured-first')).toEqual({
        key: 'Slot1_Filename',
        source: 'fallback',
        prior: { found: false },
      });
    });

    it('fallback은 첫 번째 후보 키, 후보가 없으면 설정된 키', () => {
      const ini = writeFile(tmp.dir, 'PCSX2.ini', '[MemoryCards]\n');
      expect(resolve(ini, 'CustomCard', 'configured-first').key).toBe('Slot1_Filename');
      expect(resolveKey(ini, 'MemoryCards', 'CustomCard', [], 'configured-first').key).toBe(
        'CustomCard',
      );
    });
  });

  describe('discovered-first', () => {
    it('파일에 먼저 나온 후보를 설정된 키보다 우선한다', () => {
      const ini = writeFile(tmp.dir, 'PCSX2.ini', BOTH_KEYS);
      expect(resolve(ini, 'Slot1_Filename', 'discovered-first')).toEqual({
        key: 'Mcd001',
        source: 'discovered',
        prior: { found: true, value: 'a.ps2' },
      });
    });

    it('후보에 없는 설정 키는 후보 탐색 실패 후 사용한다', () => {
      const ini = writeFile(tmp.dir, 'PCSX2.ini', '[MemoryCards]\nCustomCard=c.ps2\n');
      expect(resolve(ini, 'CustomCard', 'discovered-first')).toEqual({
        key: 'CustomCard',
        source: 'configured',
        prior: { found: true, value: 'c.ps2' },
      });
    });
  });

  it('파일을 읽을 수 없으면 fallback', () => {
    expect(resolve('', 'Slot1_Filename', 'configured-first')).toEqual({
      key: 'Slot1_Filename',
      source: 'fallback',
      prior: { found: false },
    });
  });
});
