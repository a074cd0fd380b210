// packages/config/src/paths.ts
import { getSettingsFilePath } from '@cardlane/infra';
import * as path from 'node:path';

/**
 * 설정 파일 경로 해석
 *
 * 우선순위:
 *   1. CARDLANE_SETTINGS 환경변수
 *   2. <stateDir>/config/settings.json5 (CARDLANE_STATE_DIR 또는 ~/.cardlane)
 */
export function resolveSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  const envPath = env.CARDLANE_SETTINGS;
  if (envPath) {
    return path.resolve(envPath);
  }
  return getSettingsFilePath(env);
}
