import type { LogLevel } from '@cardlane/types';
// packages/infra/src/logger.ts
import { Logger as TsLogger, type ILogObj } from 'tslog';
import { getContext } from './context.js';
import { getEnv, isTruthyEnvValue } from './env.js';
import { attachFileTransport, type FileTransportConfig } from './logger-transports.js';

export interface LoggerConfig {
  name: string;
  level?: LogLevel;
  file?: FileTransportConfig;
  console?: {
    enabled: boolean;
    pretty?: boolean; // 기본: !isCI
  };
  redactKeys?: string[];
  autoInjectContext?: boolean; // 기본: true
}

export interface CardlaneLogger {
  trace(msg: string, ...args: unknown[]): void;
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  fatal(msg: string, ...args: unknown[]): void;
  child(name: string): CardlaneLogger;
  flush(): Promise<void>;
}

/** 컴포넌트가 주입받는 최소 로거 표면 */
export type ComponentLogger = Pick<CardlaneLogger, 'debug' | 'info' | 'warn' | 'error'>;

const DEFAULT_REDACT_KEYS = ['token', 'password', 'secret', 'apiKey', 'authorization'];

const LOG_LEVEL_MAP: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

/** cardlane 로거 팩토리 (기본 구현) */
export function createLogger(config: LoggerConfig): CardlaneLogger {
  const isCI = isTruthyEnvValue(process.env.CI);
  const consoleEnabled = config.console?.enabled ?? true;
  const pretty = config.console?.pretty ?? !isCI;
  const tsLogger = new TsLogger<ILogObj>({
    name: config.name,
    minLevel: LOG_LEVEL_MAP[config.level ?? 'info'],
    type: !consoleEnabled ? 'hidden' : pretty ? 'pretty' : 'json',
    maskValuesOfKeys: config.redactKeys ?? DEFAULT_REDACT_KEYS,
    hideLogPositionForProduction: true,
  });

  const flushCallbacks: (() => Promise<void>)[] = [];
  if (config.file?.enabled) {
    const flush = attachFileTransport(tsLogger, config.file);
    if (flush) {
      flushCallbacks.push(flush);
    }
  }

  return wrapLogger(tsLogger, config.autoInjectContext ?? true, flushCallbacks);
}

/** tslog 인스턴스를 CardlaneLogger로 래핑 */
function wrapLogger(
  tsLogger: TsLogger<ILogObj>,
  injectContext: boolean,
  flushCallbacks: (() => Promise<void>)[],
): CardlaneLogger {
  const withCtx = (args: unknown[]): unknown[] => {
    if (!injectContext) {
      return args;
    }
    const ctx = getContext();
    if (!ctx) {
      return args;
    }
    return [{ _ctx: { sessionId: ctx.sessionId, event: ctx.event } }, ...args];
  };

  return {
    trace: (msg, ...args) => tsLogger.trace(msg, ...withCtx(args)),
    debug: (msg, ...args) => tsLogger.debug(msg, ...withCtx(args)),
    info: (msg, ...args) => tsLogger.info(msg, ...withCtx(args)),
    warn: (msg, ...args) => tsLogger.warn(msg, ...withCtx(args)),
    error: (msg, ...args) => tsLogger.error(msg, ...withCtx(args)),
    fatal: (msg, ...args) => tsLogger.fatal(msg, ...withCtx(args)),
    child: (name: string) => {
      // 서브 로거는 부모의 트랜스포트를 상속하므로 flush 대상도 공유
      const childTsLogger = tsLogger.getSubLogger({ name });
      return wrapLogger(childTsLogger, injectContext, flushCallbacks);
    },
    flush: async () => {
      await Promise.all(flushCallbacks.map((fn) => fn()));
    },
  };
}

let rootLogger: CardlaneLogger | undefined;

/**
 * 프로세스 공용 루트 로거 (지연 생성)
 *
 * 레벨은 CARDLANE_LOG_LEVEL 환경변수, 없으면 info.
 */
export function getRootLogger(): CardlaneLogger {
  if (!rootLogger) {
    rootLogger = createLogger({ name: 'cardlane', level: readLevelFromEnv() });
  }
  return rootLogger;
}

function readLevelFromEnv(): LogLevel {
  const raw = getEnv('LOG_LEVEL')?.toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

/** 자체 키만 인정 (constructor 같은 상속 속성은 레벨이 아니다) */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVEL_MAP, value);
}
