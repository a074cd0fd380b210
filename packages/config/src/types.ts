import type { ComponentLogger } from '@cardlane/infra';

/** createSettingsIO()에 주입하는 의존성 (모두 sync) */
export interface SettingsDeps {
  fs?: Pick<typeof import('node:fs'), 'readFileSync'>;
  json5?: { parse(text: string): unknown };
  env?: NodeJS.ProcessEnv;
  homedir?: () => string;
  settingsPath?: string;
  logger?: ComponentLogger;
}

/** 검증 이슈 한 건 */
export interface SettingsIssue {
  path: string;
  message: string;
  severity: 'error' | 'warning';
}
