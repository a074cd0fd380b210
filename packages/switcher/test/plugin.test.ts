import { createSettingsIO } from '@cardlane/config';
import { createLogger } from '@cardlane/infra';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createCardlane, type Cardlane } from '../src/plugin.js';
import { createTempDir, makeGame, PS2, readFile, writeFile } from './helpers.js';

const okami = makeGame('okami-id', 'Okami');

describe('createCardlane', () => {
  let tmp: ReturnType<typeof createTempDir>;
  let ini: string;
  let output: string;
  let app: Cardlane;

  beforeEach(() => {
    tmp = createTempDir();
    ini = writeFile(tmp.dir, 'PCSX2.ini', '[MemoryCards]\nSlot1_Filename=/old/path.ps2\n');
    const template = writeFile(tmp.dir, 'template.ps2', 'TEMPLATE');
    output = path.join(tmp.dir, 'cards');
    const settingsPath = writeFile(
      tmp.dir,
      'settings.json5',
      `{
        enableAutoSwitch: true,
        autoCreateMissingCard: true,
        templateMemoryCardPath: ${JSON.stringify(template)},
        outputFolderPath: ${JSON.stringify(output)},
        pcsx2ConfigPath: ${JSON.stringify(ini)},
      }`,
    );

    app = createCardlane({
      library: {
        games: () => [okami],
        platforms: () => [{ id: PS2, name: 'Sony PlayStation 2' }],
      },
      settingsIO: createSettingsIO({ settingsPath }),
      logger: createLogger({ name: 'test', console: { enabled: false } }),
    });
  });

  afterEach(async () => {
    await app.dispose();
    tmp.cleanup();
  });

  it('설정 파일을 읽어 적용한다', () => {
    expect(app.settings().enableAutoSwitch).toBe(true);
    expect(app.settings().pcsx2IniKey).toBe('Slot1_Filename');
  });

  it('게임 시작/종료 이벤트로 카드를 전환하고 복원한다', () => {
    const cardPath = path.join(output, 'Okami.ps2');

    app.events.emit('game:starting', okami);
    expect(readFile(ini)).toBe(
      `[MemoryCards]\nSlot1_Filename=${cardPath}\nMcd001=${cardPath}\n`,
    );
    expect(app.session.current()?.sessionId).toBe('okami-id');

    app.events.emit('game:stopped', okami);
    expect(readFile(ini)).toBe(
      `[MemoryCards]\nSlot1_Filename=/old/path.ps2\nMcd001=${cardPath}\n`,
    );
  });

  it('현재 설정으로 카드를 일괄 생성한다', () => {
    const result = app.createMemoryCards();
    expect(result.createdCount).toBe(1);
    expect(fs.readdirSync(output)).toEqual(['Okami.ps2']);
  });

  it('저장한 설정은 다음 이벤트부터 적용된다', () => {
    app.saveSettings({ ...app.settings(), enableAutoSwitch: false });

    app.events.emit('game:starting', okami);

    expect(readFile(ini)).toBe('[MemoryCards]\nSlot1_Filename=/old/path.ps2\n');
    expect(app.settings().enableAutoSwitch).toBe(false);
    expect(readFile(path.join(tmp.dir, 'settings.json5'))).toContain('"enableAutoSwitch": false');
  });

  it('키 결정 정책은 이벤트마다 현재 설정에서 읽는다', () => {
    writeFile(
      tmp.dir,
      'PCSX2.ini',
      '[MemoryCards]\nMcd001=/old/mcd.ps2\nSlot1_Filename=/old/path.ps2\n',
    );

    app.events.emit('game:starting', okami);
    expect(app.session.current()?.key).toBe('Slot1_Filename');
    expect(app.session.current()?.prior).toEqual({ found: true, value: '/old/path.ps2' });
    app.events.emit('game:stopped', okami);

    app.saveSettings({ ...app.settings(), keyResolution: 'discovered-first' });
    app.events.emit('game:starting', okami);
    expect(app.session.current()?.key).toBe('Mcd001');
  });

  it('dispose 후에는 이벤트를 처리하지 않는다', async () => {
    await app.dispose();
    app.events.emit('game:starting', okami);
    expect(readFile(ini)).toBe('[MemoryCards]\nSlot1_Filename=/old/path.ps2\n');
  });
});
