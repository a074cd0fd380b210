import { fileExists, toError, writeFileAtomicSync } from '@cardlane/infra';
import { err, ok, type Result } from '@cardlane/types';
// packages/ini/src/editor.ts
import * as fs from 'node:fs';
import {
  decodeIniBytes,
  encodeIniText,
  equalsIgnoreCase,
  findEntry,
  findSection,
  findSectionEnd,
  fitsEncoding,
  isSectionHeader,
  parseIniDocument,
  serializeIniDocument,
  type IniDocument,
} from './document.js';
import { IniError } from './errors.js';

/** 조회 실패 사유: 예외가 아닌 정상 분기 */
export type LookupMiss =
  | 'file-missing'
  | 'unreadable'
  | 'section-missing'
  | 'key-missing'
  | 'no-candidates';

export type KeyLookup = { found: true; key: string } | { found: false; reason: LookupMiss };

export type ValueLookup =
  | { found: true; key: string; value: string }
  | { found: false; reason: LookupMiss };

export type IniChange = 'updated' | 'inserted' | 'section-appended';

export interface IniWriteOutcome {
  change: IniChange;
  /** 새로 쓰인 `key=value` 줄의 위치 */
  lineIndex: number;
}

// ─── 문서 단위 (순수 함수) ───

/**
 * 섹션 영역에서 후보 중 하나와 일치하는 첫 키
 *
 * 후보 목록의 순서가 아니라 파일에 나타난 순서로 고르며,
 * 반환값은 후보 철자가 아닌 파일에 적힌 철자.
 */
export function findCandidateKeyInDocument(
  doc: IniDocument,
  section: string,
  candidates: readonly string[],
): KeyLookup {
  if (candidates.length === 0) {
    return { found: false, reason: 'no-candidates' };
  }

  const sectionIndex = findSection(doc.lines, section);
  if (sectionIndex < 0) {
    return { found: false, reason: 'section-missing' };
  }

  const entry = findEntry(doc.lines, sectionIndex, (key) =>
    candidates.some((candidate) => equalsIgnoreCase(candidate, key)),
  );
  return entry ? { found: true, key: entry.key } : { found: false, reason: 'key-missing' };
}

export function readValueFromDocument(doc: IniDocument, section: string, key: string): ValueLookup {
  const sectionIndex = findSection(doc.lines, section);
  if (sectionIndex < 0) {
    return { found: false, reason: 'section-missing' };
  }

  const entry = findEntry(doc.lines, sectionIndex, (parsed) => equalsIgnoreCase(parsed, key));
  return entry
    ? { found: true, key: entry.key, value: entry.value }
    : { found: false, reason: 'key-missing' };
}

/**
 * 값 쓰기: 새 문서를 반환하고 입력은 건드리지 않는다
 *
 * 1. 섹션 없음 → 파일 끝에 빈 줄(필요 시) + 헤더 + 항목 추가
 * 2. 키 있음 → 첫 항목 줄만 `key=value`로 교체
 * 3. 키 없음 → 다음 섹션 헤더 바로 앞(없으면 문서 끝)에 삽입
 */
export function setValueInDocument(
  doc: IniDocument,
  section: string,
  key: string,
  value: string,
): { document: IniDocument; outcome: IniWriteOutcome } {
  const lines = [...doc.lines];
  // 기존 줄은 자기 줄바꿈을 유지하고, 새 줄은 doc.eol을 받는다
  const terminators = doc.lines.map((_, i) => doc.terminators[i] ?? doc.eol);
  // 빈 문서에 줄을 추가하면 마지막 줄바꿈을 붙인다
  const finalNewline = doc.finalNewline || doc.lines.length === 0;
  const line = `${key}=${value}`;

  const sectionIndex = findSection(lines, section);
  if (sectionIndex < 0) {
    if (lines.length > 0 && lines[lines.length - 1].trim() !== '') {
      lines.push('');
      terminators.push(doc.eol);
    }
    lines.push(`[${section}]`, line);
    terminators.push(doc.eol, doc.eol);
    return {
      document: { ...doc, lines, terminators, finalNewline },
      outcome: { change: 'section-appended', lineIndex: lines.length - 1 },
    };
  }

  const existing = findEntry(lines, sectionIndex, (parsed) => equalsIgnoreCase(parsed, key));
  if (existing) {
    lines[existing.index] = line;
    return {
      document: { ...doc, lines, terminators, finalNewline },
      outcome: { change: 'updated', lineIndex: existing.index },
    };
  }

  const insertIndex = findSectionEnd(lines, sectionIndex);
  lines.splice(insertIndex, 0, line);
  terminators.splice(insertIndex, 0, doc.eol);
  return {
    document: { ...doc, lines, terminators, finalNewline },
    outcome: { change: 'inserted', lineIndex: insertIndex },
  };
}

// ─── 파일 단위 ───

/**
 * 파일 전체를 읽어 문서로 변환 (핸들은 읽기 직후 닫힌다)
 *
 * UTF-8이 아닌 파일은 latin1 문서가 되어 같은 인코딩으로 다시 쓰인다.
 */
export function readIniFile(filePath: string): Result<IniDocument, IniError> {
  if (filePath.trim() === '') {
    return err(new IniError('INI path is empty.', 'INI_PATH_EMPTY'));
  }
  if (!fileExists(filePath)) {
    return err(
      new IniError('INI file does not exist.', 'INI_FILE_MISSING', { details: { filePath } }),
    );
  }

  try {
    const { text, encoding } = decodeIniBytes(fs.readFileSync(filePath));
    return ok(parseIniDocument(text, encoding));
  } catch (cause) {
    return err(
      new IniError(`Failed to read INI file: ${toError(cause).message}`, 'INI_IO_FAILURE', {
        cause: toError(cause),
        details: { filePath },
      }),
    );
  }
}

export function findCandidateKey(
  filePath: string,
  section: string,
  candidates: readonly string[],
): KeyLookup {
  if (candidates.length === 0) {
    return { found: false, reason: 'no-candidates' };
  }

  const read = readIniFile(filePath);
  if (!read.ok) {
    return { found: false, reason: missFromError(read.error) };
  }
  return findCandidateKeyInDocument(read.value, section, candidates);
}

export function readValue(filePath: string, section: string, key: string): ValueLookup {
  const read = readIniFile(filePath);
  if (!read.ok) {
    return { found: false, reason: missFromError(read.error) };
  }
  return readValueFromDocument(read.value, section, key);
}

/**
 * 값 쓰기 (파일 전체 read-modify-write)
 *
 * 파일이 없으면 만들지 않고 에러를 반환한다. 에러는 throw하지 않는다.
 */
export function writeValue(
  filePath: string,
  section: string,
  key: string,
  value: string,
): Result<IniWriteOutcome, IniError> {
  const invalid = validateEntry(section, key, value);
  if (invalid) {
    return err(invalid);
  }

  const read = readIniFile(filePath);
  if (!read.ok) {
    return read;
  }

  if (!fitsEncoding(`[${section}]${key}=${value}`, read.value.encoding)) {
    return err(
      new IniError(
        `INI entry "${key}" cannot be written in the file's ${read.value.encoding} encoding.`,
        'INI_INVALID_ENTRY',
        { details: { filePath, section, key } },
      ),
    );
  }

  const { document, outcome } = setValueInDocument(read.value, section, key, value);
  const bytes = encodeIniText(serializeIniDocument(document), document.encoding);
  try {
    writeFileAtomicSync(filePath, bytes);
  } catch (cause) {
    return err(
      new IniError(`Failed to write INI file: ${toError(cause).message}`, 'INI_IO_FAILURE', {
        cause: toError(cause),
        details: { filePath, section, key },
      }),
    );
  }
  return ok(outcome);
}

/** 쓰기 결과가 한 줄 `key=value`로 다시 읽히는지 검사 */
function validateEntry(section: string, key: string, value: string): IniError | undefined {
  const newline = /[\r\n]/;
  if (section.trim() === '' || newline.test(section)) {
    return new IniError('INI section name is empty or spans multiple lines.', 'INI_INVALID_ENTRY', {
      details: { section },
    });
  }
  const breaksEntry =
    key.trim() === '' ||
    key.includes('=') ||
    newline.test(key) ||
    isSectionHeader(key) ||
    /^\s*[;#]/.test(key);
  if (breaksEntry) {
    return new IniError(`INI key "${key}" cannot be written as an entry.`, 'INI_INVALID_ENTRY', {
      details: { key },
    });
  }
  if (newline.test(value)) {
    return new IniError('INI values cannot span multiple lines.', 'INI_INVALID_ENTRY', {
      details: { key },
    });
  }
  return undefined;
}

function missFromError(error: IniError): LookupMiss {
  return error.code === 'INI_IO_FAILURE' ? 'unreadable' : 'file-missing';
}
