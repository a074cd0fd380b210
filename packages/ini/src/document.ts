// packages/ini/src/document.ts

export type LineEnding = '\n' | '\r\n';

/** 디스크상의 문자 인코딩: UTF-8로 읽히지 않는 파일은 latin1로 바이트를 보존 */
export type IniEncoding = 'utf-8' | 'latin1';

/**
 * 메모리에 올린 INI 문서
 *
 * 한 번의 read-modify-write 동안만 존재한다.
 * 다시 쓸 때 BOM, 줄마다의 줄바꿈, 마지막 줄바꿈 유무, 인코딩을 읽은 그대로 복원.
 */
export interface IniDocument {
  readonly lines: readonly string[];
  /** lines[i] 뒤에 오는 줄바꿈 (마지막 줄은 finalNewline일 때만 쓰인다) */
  readonly terminators: readonly LineEnding[];
  /** 새로 추가하는 줄에 붙일 줄바꿈 (파일의 첫 줄바꿈) */
  readonly eol: LineEnding;
  readonly finalNewline: boolean;
  readonly bom: boolean;
  readonly encoding: IniEncoding;
}

/** key=value 항목 (key/value 모두 trim된 상태) */
export interface IniEntry {
  key: string;
  value: string;
}

const BOM = '\uFEFF';

export function parseIniDocument(text: string, encoding: IniEncoding = 'utf-8'): IniDocument {
  const bom = text.startsWith(BOM);
  const body = bom ? text.slice(BOM.length) : text;

  if (body === '') {
    return { lines: [], terminators: [], eol: '\n', finalNewline: false, bom, encoding };
  }

  // split은 캡처 그룹을 결과에 포함: [줄, 줄바꿈, 줄, 줄바꿈, ..., 마지막 조각]
  const parts = body.split(/(\r?\n)/);
  const lines: string[] = [];
  const terminators: LineEnding[] = [];
  for (let i = 0; i < parts.length; i += 2) {
    lines.push(parts[i]);
    const terminator = parts[i + 1];
    if (terminator !== undefined) {
      terminators.push(terminator === '\r\n' ? '\r\n' : '\n');
    }
  }

  const finalNewline = terminators.length > 0 && lines[lines.length - 1] === '';
  if (finalNewline) {
    lines.pop();
  }
  const eol = terminators[0] ?? '\n';
  return { lines, terminators, eol, finalNewline, bom, encoding };
}

export function serializeIniDocument(doc: IniDocument): string {
  let body = '';
  const last = doc.lines.length - 1;
  doc.lines.forEach((line, i) => {
    body += line;
    if (i < last || doc.finalNewline) {
      body += doc.terminators[i] ?? doc.eol;
    }
  });
  return `${doc.bom ? BOM : ''}${body}`;
}

/**
 * 파일 바이트 디코딩
 *
 * 올바른 UTF-8이 아니면 latin1로 읽는다. latin1은 모든 바이트를 1:1로 보존하므로
 * 건드리지 않은 줄은 다시 쓸 때 원래 바이트 그대로 남는다.
 */
export function decodeIniBytes(bytes: Uint8Array): { text: string; encoding: IniEncoding } {
  try {
    const text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
    return { text, encoding: 'utf-8' };
  } catch {
    return { text: Buffer.from(bytes).toString('latin1'), encoding: 'latin1' };
  }
}

export function encodeIniText(text: string, encoding: IniEncoding): Buffer {
  return Buffer.from(text, encoding === 'latin1' ? 'latin1' : 'utf-8');
}

/** latin1로 표현할 수 없는 문자(U+0100 이상) 포함 여부 */
export function fitsEncoding(text: string, encoding: IniEncoding): boolean {
  return encoding === 'utf-8' || !/[^\u0000-\u00ff]/.test(text);
}

// ─── 줄 단위 판별 ───

/** trim 후 `[`로 시작하고 `]`로 끝나면 섹션 헤더 (괄호 안 내용은 따지지 않음) */
export function isSectionHeader(line: string): boolean {
  const trimmed = line.trim();
  return trimmed.startsWith('[') && trimmed.endsWith(']');
}

/** 빈 줄이거나 `;`/`#` 주석 */
export function isCommentOrBlank(line: string): boolean {
  const trimmed = line.trimStart();
  return trimmed === '' || trimmed.startsWith(';') || trimmed.startsWith('#');
}

/**
 * `key=value` 파싱
 *
 * 첫 `=` 기준으로 나누며, `=`가 맨 앞이거나 key가 공백뿐이면 항목이 아니다.
 */
export function parseKeyValue(line: string): IniEntry | undefined {
  if (isCommentOrBlank(line)) {
    return undefined;
  }

  const trimmed = line.trimStart();
  const separatorIndex = trimmed.indexOf('=');
  if (separatorIndex <= 0) {
    return undefined;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  if (key === '') {
    return undefined;
  }
  return { key, value: trimmed.slice(separatorIndex + 1).trim() };
}

export function equalsIgnoreCase(a: string, b: string): boolean {
  return a.toUpperCase() === b.toUpperCase();
}

// ─── 섹션/항목 탐색 ───

/** 이름이 일치하는 첫 섹션 헤더의 줄 번호, 없으면 -1 */
export function findSection(lines: readonly string[], section: string): number {
  if (section.trim() === '') {
    return -1;
  }

  const header = `[${section}]`;
  return lines.findIndex((line) => equalsIgnoreCase(line.trim(), header));
}

/** 섹션 영역의 끝 (다음 섹션 헤더의 줄 번호, 없으면 lines.length) */
export function findSectionEnd(lines: readonly string[], sectionIndex: number): number {
  for (let i = sectionIndex + 1; i < lines.length; i++) {
    if (isSectionHeader(lines[i])) {
      return i;
    }
  }
  return lines.length;
}

/** 섹션 영역을 위에서부터 훑어 조건에 맞는 첫 항목 */
export function findEntry(
  lines: readonly string[],
  sectionIndex: number,
  matches: (key: string) => boolean,
): (IniEntry & { index: number }) | undefined {
  const end = findSectionEnd(lines, sectionIndex);
  for (let i = sectionIndex + 1; i < end; i++) {
    const entry = parseKeyValue(lines[i]);
    if (entry && matches(entry.key)) {
      return { ...entry, index: i };
    }
  }
  return undefined;
}
