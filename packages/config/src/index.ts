// @cardlane/config — barrel export

// 타입
export type { SettingsDeps, SettingsIssue } from './types.js';
export type { ValidationResult } from './validation.js';
export type { SettingsIO } from './io.js';

// 에러
export { SettingsError } from './errors.js';

// 스키마
export { SwitcherSettingsSchema } from './zod-schema.js';
export type { UserSettings } from './zod-schema.js';

// 검증
export { validateSettings } from './validation.js';

// 파이프라인 개별 단계
export { resolveSettingsPath } from './paths.js';
export { normalizePaths, expandTilde } from './normalize-paths.js';
export { applyDefaults, getDefaults } from './defaults.js';

// IO (파이프라인 통합)
export { createSettingsIO } from './io.js';
