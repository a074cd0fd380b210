// packages/config/src/io.ts
import { ensureDirSync, getErrnoCode, toError, writeFileAtomicSync } from '@cardlane/infra';
import type { SwitcherSettings } from '@cardlane/types';
import JSON5 from 'json5';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { SettingsDeps } from './types.js';
import { applyDefaults } from './defaults.js';
import { SettingsError } from './errors.js';
import { normalizePaths } from './normalize-paths.js';
import { resolveSettingsPath } from './paths.js';
import { validateSettings } from './validation.js';

/** 스위처 설정 읽기/쓰기 파사드 */
export interface SettingsIO {
  /** 4단계 파이프라인으로 설정 로드 */
  loadSettings(): SwitcherSettings;
  /** 설정 파일 원자적 쓰기 */
  saveSettings(settings: SwitcherSettings): void;
  /** 현재 설정 파일 경로 */
  readonly settingsPath: string;
}

/**
 * SettingsIO 팩토리
 *
 * 4단계 파이프라인:
 *   1. 파일 읽기 (JSON5, 없으면 빈 설정)
 *   2. 경로 정규화 (~/)
 *   3. Zod 검증 (실패 시 경고 후 기본값)
 *   4. 기본값 적용
 */
export function createSettingsIO(deps: SettingsDeps = {}): SettingsIO {
  const fsModule = deps.fs ?? fs;
  const json5Module = deps.json5 ?? JSON5;
  const env = deps.env ?? process.env;
  const homedir = deps.homedir ?? os.homedir;
  const settingsPath = deps.settingsPath ?? resolveSettingsPath(env);
  const logger = deps.logger;

  function readRaw(): unknown {
    let content: string;
    try {
      content = fsModule.readFileSync(settingsPath, 'utf-8');
    } catch (err) {
      if (getErrnoCode(err) === 'ENOENT') {
        logger?.debug(`Settings file not found: ${settingsPath}, using defaults`);
        return {};
      }
      throw new SettingsError(`Failed to read settings: ${settingsPath}`, {
        cause: toError(err),
      });
    }

    try {
      return json5Module.parse(content);
    } catch (err) {
      throw new SettingsError(`Failed to parse settings: ${settingsPath}`, {
        cause: toError(err),
      });
    }
  }

  function loadSettings(): SwitcherSettings {
    // 1. 파일 읽기
    const raw = readRaw();

    // 2. 경로 정규화
    const normalized = normalizePaths(raw, homedir);

    // 3. Zod 검증
    const { valid, settings, issues } = validateSettings(normalized);
    if (!valid) {
      for (const issue of issues) {
        logger?.warn(`Settings issue [${issue.path}]: ${issue.message}`);
      }
    }

    // 4. 기본값 적용
    return applyDefaults(settings);
  }

  function saveSettings(settings: SwitcherSettings): void {
    const content = JSON.stringify(settings, null, 2) + '\n';
    try {
      ensureDirSync(path.dirname(settingsPath));
      writeFileAtomicSync(settingsPath, content);
    } catch (err) {
      throw new SettingsError(`Failed to write settings: ${settingsPath}`, {
        cause: toError(err),
      });
    }
    logger?.info(`Settings saved: ${settingsPath}`);
  }

  return {
    loadSettings,
    saveSettings,
    get settingsPath() {
      return settingsPath;
    },
  };
}
