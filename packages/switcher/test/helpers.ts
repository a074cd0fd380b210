// packages/switcher/test/helpers.ts
import { createGameId, createPlatformId, type GameRecord, type PlatformId } from '@cardlane/types';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { vi } from 'vitest';

export const PS2 = createPlatformId('platform-ps2');
export const GC = createPlatformId('platform-gc');

/** ComponentLogger 형태의 vi.fn 로거 */
export function createFakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function makeGame(id: string, name: string, platformIds: PlatformId[] = [PS2]): GameRecord {
  return { id: createGameId(id), name, platformIds };
}

/** 테스트별 임시 디렉토리 */
export function createTempDir(): { dir: string; cleanup: () => void } {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cardlane-switcher-test-'));
  return { dir, cleanup: () => fs.rmSync(dir, { recursive: true, force: true }) };
}

export function writeFile(dir: string, name: string, content: string): string {
  const filePath = path.join(dir, name);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf-8');
  return filePath;
}

export function readFile(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}
