// packages/config/test/defaults.test.ts
import { describe, it, expect } from 'vitest';
import { applyDefaults, getDefaults } from '../src/defaults.js';

describe('getDefaults', () => {
  it('기본값을 반환한다', () => {
    const defaults = getDefaults();
    expect(defaults.enableAutoSwitch).toBe(false);
    expect(defaults.restoreOnExit).toBe(true);
    expect(defaults.pcsx2IniSection).toBe('MemoryCards');
    expect(defaults.pcsx2IniKey).toBe('Slot1_Filename');
    expect(defaults.keyResolution).toBe('configured-first');
    expect(defaults.logging.level).toBe('info');
    expect(defaults.platformId).toBeUndefined();
  });

  it('반환값은 frozen이다', () => {
    const defaults = getDefaults();
    expect(Object.isFrozen(defaults)).toBe(true);
    expect(Object.isFrozen(defaults.logging)).toBe(true);
  });
});

describe('applyDefaults', () => {
  it('빈 설정에 모든 기본값을 적용한다', () => {
    expect(applyDefaults({})).toEqual({
      templateMemoryCardPath: '',
      outputFolderPath: '',
      enableAutoSwitch: false,
      restoreOnExit: true,
      autoCreateMissingCard: false,
      writeFileNameOnly: false,
      pcsx2ConfigPath: '',
      pcsx2IniSection: 'MemoryCards',
      pcsx2IniKey: 'Slot1_Filename',
      keyResolution: 'configured-first',
      logging: { level: 'info' },
    });
  });

  it('유저 값이 기본값을 오버라이드한다', () => {
    const result = applyDefaults({
      enableAutoSwitch: true,
      restoreOnExit: false,
      pcsx2IniKey: 'Mcd001',
      keyResolution: 'discovered-first',
      logging: { level: 'debug' },
    });
    expect(result.enableAutoSwitch).toBe(true);
    expect(result.restoreOnExit).toBe(false);
    expect(result.pcsx2IniKey).toBe('Mcd001');
    expect(result.pcsx2IniSection).toBe('MemoryCards');
    expect(result.keyResolution).toBe('discovered-first');
    expect(result.logging.level).toBe('debug');
  });

  it('platformId는 있을 때만 설정한다', () => {
    expect(applyDefaults({ platformId: 'ps2' }).platformId).toBe('ps2');
    expect('platformId' in applyDefaults({ platformId: '' })).toBe(false);
  });

  it('원본 기본값을 변경하지 않는다', () => {
    applyDefaults({ logging: { level: 'error' } });
    expect(getDefaults().logging.level).toBe('info');
  });
});
