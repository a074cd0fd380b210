// @cardlane/ini — barrel export

// 에러
export { IniError, type IniErrorCode } from './errors.js';

// 문서 모델 / 줄 판별
export {
  parseIniDocument,
  serializeIniDocument,
  decodeIniBytes,
  encodeIniText,
  fitsEncoding,
  isSectionHeader,
  isCommentOrBlank,
  parseKeyValue,
  equalsIgnoreCase,
  findSection,
  findSectionEnd,
  findEntry,
  type IniDocument,
  type IniEntry,
  type LineEnding,
  type IniEncoding,
} from './document.js';

// 편집기
export {
  findCandidateKeyInDocument,
  readValueFromDocument,
  setValueInDocument,
  readIniFile,
  findCandidateKey,
  readValue,
  writeValue,
  type LookupMiss,
  type KeyLookup,
  type ValueLookup,
  type IniChange,
  type IniWriteOutcome,
} from './editor.js';
