// @cardlane/infra — barrel export

// 에러
export {
  CardlaneError,
  isCardlaneError,
  toError,
  getErrnoCode,
  extractErrorInfo,
} from './errors.js';

// 컨텍스트
export { runWithContext, getContext, type LogContext } from './context.js';

// 환경/경로
export { getEnv, isTruthyEnvValue } from './env.js';
export { getStateDir, getConfigDir, getLogDir, getSettingsFilePath } from './paths.js';

// 로깅
export {
  createLogger,
  getRootLogger,
  type LoggerConfig,
  type CardlaneLogger,
  type ComponentLogger,
} from './logger.js';
export { attachFileTransport, type FileTransportConfig } from './logger-transports.js';

// 이벤트
export { createTypedEmitter, type EventMap, type TypedEmitter } from './events.js';

// 파일시스템
export {
  writeFileAtomicSync,
  fileExists,
  ensureDirSync,
  copyFileExclusiveSync,
} from './fs-safe.js';
