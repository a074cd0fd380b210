import * as crypto from 'node:crypto';
// packages/infra/src/fs-safe.ts
import * as fs from 'node:fs';
import * as path from 'node:path';
import { getErrnoCode } from './errors.js';

/**
 * 원자적 파일 쓰기 (동기)
 *
 * 1. 같은 디렉토리의 임시 파일에 쓰기 (PID+UUID로 충돌 방지)
 * 2. renameSync()로 원자적 교체
 * 3. Windows fallback: copyFile + chmod + unlink
 *
 * mode 미지정 시 기존 파일의 퍼미션을 유지하고, 새 파일이면 0o600.
 */
export function writeFileAtomicSync(
  filePath: string,
  data: string | Buffer,
  mode: number = existingMode(filePath) ?? 0o600,
): void {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(dir, `.tmp.${process.pid}.${crypto.randomUUID()}`);

  try {
    fs.writeFileSync(tmpPath, data, { mode });
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    if (isWindowsRenameError(err)) {
      fs.copyFileSync(tmpPath, filePath);
      fs.chmodSync(filePath, mode);
      fs.rmSync(tmpPath, { force: true });
    } else {
      fs.rmSync(tmpPath, { force: true });
      throw err;
    }
  }
}

/** 일반 파일 존재 여부 (디렉토리는 false) */
export function fileExists(filePath: string): boolean {
  if (filePath.trim() === '') {
    return false;
  }
  return fs.statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
}

/** 디렉토리 존재 보장 (존재하지 않으면 생성) */
export function ensureDirSync(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

/**
 * 파일 복사 (대상이 이미 있으면 EEXIST로 실패)
 *
 * 대상 디렉토리가 없으면 먼저 생성.
 */
export function copyFileExclusiveSync(sourcePath: string, destinationPath: string): void {
  ensureDirSync(path.dirname(destinationPath));
  fs.copyFileSync(sourcePath, destinationPath, fs.constants.COPYFILE_EXCL);
}

function existingMode(filePath: string): number | undefined {
  const stat = fs.statSync(filePath, { throwIfNoEntry: false });
  return stat ? stat.mode & 0o777 : undefined;
}

function isWindowsRenameError(err: unknown): boolean {
  const code = getErrnoCode(err);
  return process.platform === 'win32' && (code === 'EPERM' || code === 'EEXIST');
}
