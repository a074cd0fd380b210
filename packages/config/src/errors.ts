// packages/config/src/errors.ts
import { CardlaneError } from '@cardlane/infra';

/** 설정 시스템 기본 에러 */
export class SettingsError extends CardlaneError {
  constructor(message: string, opts?: { cause?: Error; details?: Record<string, unknown> }) {
    super(message, 'SETTINGS_ERROR', opts);
    this.name = 'SettingsError';
  }
}
