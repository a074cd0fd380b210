// packages/infra/test/helpers.ts
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/** 임시 디렉토리 생성 + 자동 정리 */
export async function withTempDir(fn: (dir: string) => void | Promise<void>): Promise<void> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cardlane-infra-'));
  try {
    await fn(dir);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}
