// packages/ini/src/errors.ts
import { CardlaneError } from '@cardlane/infra';

export type IniErrorCode =
  | 'INI_PATH_EMPTY' // 경로 미지정
  | 'INI_FILE_MISSING' // 파일 없음: 쓰기는 새 파일을 만들지 않는다
  | 'INI_INVALID_ENTRY' // 섹션/키/값이 한 줄 구조를 깨뜨림
  | 'INI_IO_FAILURE'; // 읽기/쓰기 예외

/** INI 편집 에러: 호출자에게 Result로 반환되며 throw되지 않는다 */
export class IniError extends CardlaneError {
  declare readonly code: IniErrorCode;

  constructor(
    message: string,
    code: IniErrorCode,
    opts?: { cause?: Error; details?: Record<string, unknown> },
  ) {
    super(message, code, opts);
    this.name = 'IniError';
  }
}
