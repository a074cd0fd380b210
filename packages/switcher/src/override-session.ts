// packages/switcher/src/override-session.ts
import { equalsIgnoreCase, findCandidateKey, writeValue } from '@cardlane/ini';
import { fileExists, getRootLogger, toError, type ComponentLogger } from '@cardlane/infra';
import { err, ok, type KeyResolutionPolicy, type Result } from '@cardlane/types';
import type {
  DesiredValue,
  KeyResolution,
  OverrideRecord,
  OverrideTarget,
  RevertOutcome,
} from './types.js';
import { OverrideError } from './errors.js';
import { resolveKey } from './key-resolution.js';
import { createInMemorySlotStore, type OverrideSlotStore } from './slot-store.js';

export interface OverrideSessionDeps {
  store?: OverrideSlotStore;
  /** 대상에 정책이 없을 때 사용 (기본: configured-first) */
  policy?: KeyResolutionPolicy;
  logger?: ComponentLogger;
}

/**
 * 설정 파일 값의 임시 덮어쓰기
 *
 * 상태: Idle(기록 없음) → apply → Active(기록 있음) → revert → Idle.
 * apply/revert는 throw하지 않는다.
 */
export interface OverrideSession {
  apply(
    sessionId: string,
    target: OverrideTarget,
    desired: DesiredValue,
  ): Result<OverrideRecord, OverrideError>;
  revert(sessionId: string): RevertOutcome;
  /** 현재 활성 기록 */
  current(): OverrideRecord | undefined;
}

export function createOverrideSession(deps: OverrideSessionDeps = {}): OverrideSession {
  const store = deps.store ?? createInMemorySlotStore();
  const defaultPolicy = deps.policy ?? 'configured-first';
  const logger = deps.logger ?? getRootLogger().child('override-session');

  function fail(error: OverrideError): Result<never, OverrideError> {
    if (error.kind === 'io') {
      logger.error(error.message);
    } else {
      logger.warn(error.message);
    }
    return err(error);
  }

  function produce(desired: DesiredValue, resolution: KeyResolution): Result<string, string> {
    if (typeof desired === 'string') {
      return ok(desired);
    }
    try {
      return desired(resolution);
    } catch (cause) {
      return err(toError(cause).message);
    }
  }

  /** 다른 후보 키와 활성화 키 맞추기, 실패는 경고만 */
  function syncCompanionKeys(target: OverrideTarget, activeKey: string, value: string): void {
    for (const candidate of target.candidateKeys) {
      if (equalsIgnoreCase(candidate, activeKey)) {
        continue;
      }
      const synced = writeValue(target.configPath, target.section, candidate, value);
      if (!synced.ok) {
        logger.warn(`Failed to sync ${candidate}: ${synced.error.message}`);
      }
    }

    const enableKey = findCandidateKey(target.configPath, target.section, target.enableKeys);
    if (!enableKey.found) {
      return;
    }
    const enabled = writeValue(target.configPath, target.section, enableKey.key, 'true');
    if (!enabled.ok) {
      logger.warn(`Failed to enable ${enableKey.key}: ${enabled.error.message}`);
    }
  }

  return {
    apply(sessionId, target, desired) {
      const invalid = validateTarget(target);
      if (invalid) {
        return fail(invalid);
      }

      const resolution = resolveKey(
        target.configPath,
        target.section,
        target.key,
        target.candidateKeys,
        target.policy ?? defaultPolicy,
      );
      logger.debug(`Resolved ${resolution.source} key ${resolution.key} in [${target.section}]`);

      const produced = produce(desired, resolution);
      if (!produced.ok) {
        return fail(new OverrideError(produced.error, 'producer', { details: { sessionId } }));
      }

      const written = writeValue(target.configPath, target.section, resolution.key, produced.value);
      if (!written.ok) {
        return fail(
          new OverrideError(`Failed to update config: ${written.error.message}`, 'io', {
            cause: written.error,
            details: { sessionId, key: resolution.key },
          }),
        );
      }

      syncCompanionKeys(target, resolution.key, produced.value);

      const record: OverrideRecord = {
        sessionId,
        configPath: target.configPath,
        section: target.section,
        key: resolution.key,
        prior: resolution.prior,
        value: produced.value,
      };
      store.set(record);
      logger.info(`Applied ${record.key}=${record.value} for session ${sessionId}`);
      return ok(record);
    },

    revert(sessionId) {
      const record = store.get();
      if (!record) {
        return 'idle';
      }
      if (record.sessionId !== sessionId) {
        return 'mismatch';
      }

      store.clear();
      if (!record.prior.found) {
        logger.debug(`No prior value for ${record.key}; leaving ${record.value} in place`);
        return 'nothing-to-restore';
      }
      if ([record.configPath, record.section, record.key].some((part) => part.trim() === '')) {
        logger.warn(`Override record for session ${sessionId} is incomplete; nothing restored`);
        return 'incomplete-record';
      }

      const restored = writeValue(
        record.configPath,
        record.section,
        record.key,
        record.prior.value,
      );
      if (!restored.ok) {
        logger.error(`Failed to restore config: ${restored.error.message}`);
        return 'restore-failed';
      }
      logger.info(`Restored ${record.key}=${record.prior.value} for session ${sessionId}`);
      return 'restored';
    },

    current() {
      return store.get();
    },
  };
}

/** 선행 조건 (첫 번째 실패만 보고) */
function validateTarget(target: OverrideTarget): OverrideError | undefined {
  if (!fileExists(target.configPath)) {
    return new OverrideError('Config path is missing or invalid.', 'validation', {
      details: { configPath: target.configPath },
    });
  }
  if (target.section.trim() === '' || target.key.trim() === '') {
    return new OverrideError('INI section/key are not configured.', 'validation', {
      details: { section: target.section, key: target.key },
    });
  }
  return undefined;
}
