// packages/infra/src/paths.ts
import * as os from 'node:os';
import * as path from 'node:path';
import { getEnv } from './env.js';

/** 기본 상태 디렉토리 */
function defaultStateDir(): string {
  return path.join(os.homedir(), '.cardlane');
}

/** cardlane 상태 디렉토리 (설정/로그의 루트) */
export function getStateDir(env: NodeJS.ProcessEnv = process.env): string {
  return getEnv('STATE_DIR', undefined, env) ?? defaultStateDir();
}

/** 설정 디렉토리 */
export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getStateDir(env), 'config');
}

/** 로그 디렉토리 */
export function getLogDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getStateDir(env), 'logs');
}

/** 플러그인 설정 파일 경로 */
export function getSettingsFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getConfigDir(env), 'settings.json5');
}
