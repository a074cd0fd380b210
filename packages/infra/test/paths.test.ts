import * as os from 'node:os';
import * as path from 'node:path';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { getStateDir, getLogDir, getConfigDir, getSettingsFilePath } from '../src/paths.js';

describe('paths', () => {
  beforeEach(() => {
    vi.unstubAllEnvs();
  });

  it('기본 stateDir은 ~/.cardlane/ 이다', () => {
    expect(getStateDir()).toBe(path.join(os.homedir(), '.cardlane'));
  });

  it('CARDLANE_STATE_DIR 환경 변수로 재정의된다', () => {
    vi.stubEnv('CARDLANE_STATE_DIR', '/tmp/custom');
    expect(getStateDir()).toBe('/tmp/custom');
  });

  it('logDir/configDir은 stateDir 하위이다', () => {
    vi.stubEnv('CARDLANE_STATE_DIR', '/tmp/test');
    expect(getLogDir()).toBe('/tmp/test/logs');
    expect(getConfigDir()).toBe('/tmp/test/config');
  });

  it('설정 파일은 config/settings.json5 이다', () => {
    expect(getSettingsFilePath({ CARDLANE_STATE_DIR: '/srv/cl' })).toBe(
      '/srv/cl/config/settings.json5',
    );
  });
});
