// packages/config/src/zod-schema.ts
import { z } from 'zod/v4';

const LoggingSchema = z.strictObject({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']),
});

/**
 * 스위처 설정 루트 스키마
 *
 * - z.strictObject() 사용: 알 수 없는 키 감지 (오타 방지)
 * - 모든 필드는 optional (빈 {} 허용)
 * - .default()는 사용하지 않음 (defaults.ts에서 별도 적용)
 */
export const SwitcherSettingsSchema = z
  .strictObject({
    platformId: z.string(),
    templateMemoryCardPath: z.string(),
    outputFolderPath: z.string(),
    enableAutoSwitch: z.boolean(),
    restoreOnExit: z.boolean(),
    autoCreateMissingCard: z.boolean(),
    writeFileNameOnly: z.boolean(),
    pcsx2ConfigPath: z.string(),
    pcsx2IniSection: z.string().min(1),
    pcsx2IniKey: z.string().min(1),
    keyResolution: z.enum(['configured-first', 'discovered-first']),
    logging: LoggingSchema.partial(),
  })
  .partial();

/** 검증을 통과한 사용자 설정 (기본값 적용 전) */
export type UserSettings = z.infer<typeof SwitcherSettingsSchema>;
