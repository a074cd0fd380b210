// packages/config/src/validation.ts
import type { SettingsIssue } from './types.js';
import { SwitcherSettingsSchema, type UserSettings } from './zod-schema.js';

export interface ValidationResult {
  valid: boolean;
  settings: UserSettings;
  issues: SettingsIssue[];
}

/**
 * Zod 기반 검증
 *
 * 실패 시 이슈를 평탄화해 반환하고 settings는 빈 {} (전부 기본값).
 */
export function validateSettings(raw: unknown): ValidationResult {
  const result = SwitcherSettingsSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, settings: result.data, issues: [] };
  }

  const issues = result.error.issues.map(
    (issue): SettingsIssue => ({
      path: issue.path.map(String).join('.') || '(root)',
      message: issue.message,
      severity: 'error',
    }),
  );
  return { valid: false, settings: {}, issues };
}
