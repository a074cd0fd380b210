import { describe, it, expect } from 'vitest';
import {
  CardlaneError,
  isCardlaneError,
  toError,
  getErrnoCode,
  extractErrorInfo,
} from '../src/errors.js';

describe('CardlaneError', () => {
  it('기본값으로 생성된다', () => {
    const err = new CardlaneError('test', 'TEST_CODE');
    expect(err.message).toBe('test');
    expect(err.code).toBe('TEST_CODE');
    expect(err.isOperational).toBe(true);
    expect(err.name).toBe('CardlaneError');
  });

  it('옵션으로 커스터마이징된다', () => {
    const cause = new Error('root');
    const err = new CardlaneError('test', 'CODE', {
      isOperational: false,
      cause,
      details: { key: 'value' },
    });
    expect(err.isOperational).toBe(false);
    expect(err.cause).toBe(cause);
    expect(err.details).toEqual({ key: 'value' });
  });

  it('Error를 상속한다', () => {
    const err = new CardlaneError('test', 'CODE');
    expect(err).toBeInstanceOf(Error);
    expect(err.stack).toBeDefined();
  });
});

describe('isCardlaneError', () => {
  it('CardlaneError만 true이다', () => {
    expect(isCardlaneError(new CardlaneError('a', 'B'))).toBe(true);
    expect(isCardlaneError(new Error('plain'))).toBe(false);
    expect(isCardlaneError('string')).toBe(false);
  });
});

describe('toError', () => {
  it('Error는 그대로, 나머지는 Error로 감싼다', () => {
    const original = new Error('disk full');
    expect(toError(original)).toBe(original);
    expect(toError(42)).toBeInstanceOf(Error);
    expect(toError(42).message).toBe('42');
  });
});

describe('getErrnoCode', () => {
  it('code 문자열을 추출한다', () => {
    const err = Object.assign(new Error('nope'), { code: 'ENOENT' });
    expect(getErrnoCode(err)).toBe('ENOENT');
  });

  it('code가 없으면 undefined', () => {
    expect(getErrnoCode(new Error('x'))).toBeUndefined();
    expect(getErrnoCode(null)).toBeUndefined();
    expect(getErrnoCode({ code: 13 })).toBeUndefined();
  });
});

describe('extractErrorInfo', () => {
  it('CardlaneError 정보를 추출한다', () => {
    const err = new CardlaneError('msg', 'CODE', { cause: new Error('inner') });
    const info = extractErrorInfo(err);
    expect(info.code).toBe('CODE');
    expect(info.message).toBe('msg');
    expect(info.isOperational).toBe(true);
    expect(info.cause).toBe('inner');
  });

  it('일반 Error는 errno 코드 또는 UNKNOWN', () => {
    expect(extractErrorInfo(new Error('plain')).code).toBe('UNKNOWN');
    const errno = Object.assign(new Error('denied'), { code: 'EACCES' });
    expect(extractErrorInfo(errno).code).toBe('EACCES');
  });

  it('Error가 아닌 값은 문자열화한다', () => {
    expect(extractErrorInfo('oops')).toEqual({ code: 'UNKNOWN', message: 'oops' });
  });
});
