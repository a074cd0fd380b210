// packages/config/src/normalize-paths.ts
import * as os from 'node:os';

/** ~/ 확장 대상 필드 */
const PATH_FIELDS = ['templateMemoryCardPath', 'outputFolderPath', 'pcsx2ConfigPath'] as const;

/**
 * ~/ 경로 확장
 *
 * 경로 필드의 문자열 값에서 ~/ 접두사를 homedir()로 치환.
 * 섹션/키 이름 같은 다른 문자열은 건드리지 않는다.
 */
export function normalizePaths(raw: unknown, homedir: () => string = os.homedir): unknown {
  if (!isPlainObject(raw)) {
    return raw;
  }

  const result: Record<string, unknown> = { ...raw };
  for (const field of PATH_FIELDS) {
    const value = result[field];
    if (typeof value === 'string') {
      result[field] = expandTilde(value, homedir);
    }
  }
  return result;
}

export function expandTilde(str: string, homedir: () => string = os.homedir): string {
  if (str === '~') {
    return homedir();
  }
  if (str.startsWith('~/') || str.startsWith('~\\')) {
    return homedir() + str.slice(1);
  }
  return str;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype
  );
}
