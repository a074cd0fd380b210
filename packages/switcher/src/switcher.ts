// packages/switcher/src/switcher.ts
import { writeValue } from '@cardlane/ini';
import { fileExists, getRootLogger, type ComponentLogger } from '@cardlane/infra';
import {
  err,
  ok,
  type GameRecord,
  type PlatformId,
  type Result,
  type SwitcherSettings,
} from '@cardlane/types';
import * as path from 'node:path';
import type { KeyResolution, OverrideRecord, RevertOutcome } from './types.js';
import type { MemoryCardManager, PlatformResolver } from './memory-cards.js';
import type { OverrideSession } from './override-session.js';
import { resolveWriteFileNameOnly } from './card-value.js';
import type { OverrideError } from './errors.js';
import { MEMORY_CARD_KEYS, SLOT_ENABLE_KEYS } from './key-resolution.js';

/** 파일 이름만 쓸 때 폴더를 기록하는 위치 */
const FOLDERS_SECTION = 'Folders';
const FOLDERS_MEMORY_CARDS_KEY = 'MemoryCards';

export type SwitchSkipReason =
  | 'no-game'
  | 'disabled'
  | 'platform-unresolved'
  | 'other-platform'
  | 'no-output-folder';

export type SwitchOutcome =
  | { status: 'skipped'; reason: SwitchSkipReason }
  | { status: 'switched'; record: OverrideRecord }
  | { status: 'failed'; error: OverrideError };

export interface MemoryCardSwitcher {
  /** 게임 시작 시 해당 게임의 카드로 전환 */
  switchMemoryCard(game: GameRecord | undefined, settings: SwitcherSettings): SwitchOutcome;
  /** 게임 종료 시 이전 카드로 복원 */
  restorePreviousCard(
    game: GameRecord | undefined,
    settings: SwitcherSettings,
  ): RevertOutcome | 'skipped';
}

export interface MemoryCardSwitcherDeps {
  session: OverrideSession;
  cards: MemoryCardManager;
  /** 기본: cards */
  platforms?: PlatformResolver;
  logger?: ComponentLogger;
}

export function createMemoryCardSwitcher(deps: MemoryCardSwitcherDeps): MemoryCardSwitcher {
  const { session, cards } = deps;
  const platforms = deps.platforms ?? cards;
  const logger = deps.logger ?? getRootLogger().child('switcher');

  function skip(reason: SwitchSkipReason): SwitchOutcome {
    return { status: 'skipped', reason };
  }

  /** 카드 파일을 확보하고 INI에 쓸 값을 만든다 */
  function produceCardValue(
    game: GameRecord,
    settings: SwitcherSettings,
    platformId: PlatformId,
    resolution: KeyResolution,
  ): Result<string, string> {
    const fileNameOnly = resolveWriteFileNameOnly(settings.writeFileNameOnly, resolution.prior);
    const fileName = cards.getMemoryCardFileName(
      platformId,
      game,
      settings.templateMemoryCardPath,
    );
    if (!fileName) {
      return err('Unable to resolve memory card file name for game.');
    }

    const fullPath = path.join(settings.outputFolderPath, fileName);
    if (!fileExists(fullPath)) {
      if (!settings.autoCreateMissingCard) {
        return err(`Memory card does not exist for "${game.name}".`);
      }
      const created = cards.createMemoryCard(fullPath, settings.templateMemoryCardPath);
      if (!created.ok) {
        return err(created.error.message);
      }
      logger.info(`Created memory card for "${game.name}": ${fullPath}`);
    }

    if (fileNameOnly) {
      const folder = writeValue(
        settings.pcsx2ConfigPath,
        FOLDERS_SECTION,
        FOLDERS_MEMORY_CARDS_KEY,
        settings.outputFolderPath,
      );
      if (!folder.ok) {
        return err(`Failed to update PCSX2 folder config: ${folder.error.message}`);
      }
    }

    return ok(fileNameOnly ? fileName : fullPath);
  }

  return {
    switchMemoryCard(game, settings) {
      if (!game) {
        return skip('no-game');
      }
      if (!settings.enableAutoSwitch) {
        return skip('disabled');
      }

      const platformId = platforms.resolvePlatformId(settings.platformId);
      if (!platformId) {
        logger.warn(
          'Auto-switch is enabled but platform is not configured and auto-detect failed.',
        );
        return skip('platform-unresolved');
      }
      if (game.platformIds?.includes(platformId) !== true) {
        return skip('other-platform');
      }
      if (settings.outputFolderPath.trim() === '') {
        logger.warn('Auto-switch is enabled but output folder is not configured.');
        return skip('no-output-folder');
      }

      const applied = session.apply(
        game.id,
        {
          configPath: settings.pcsx2ConfigPath,
          section: settings.pcsx2IniSection,
          key: settings.pcsx2IniKey,
          candidateKeys: MEMORY_CARD_KEYS,
          enableKeys: SLOT_ENABLE_KEYS,
          policy: settings.keyResolution,
        },
        (resolution) => produceCardValue(game, settings, platformId, resolution),
      );
      if (!applied.ok) {
        return { status: 'failed', error: applied.error };
      }
      logger.info(`Switched memory card for "${game.name}" to ${applied.value.value}`);
      return { status: 'switched', record: applied.value };
    },

    restorePreviousCard(game, settings) {
      if (!game || !settings.enableAutoSwitch || !settings.restoreOnExit) {
        return 'skipped';
      }
      return session.revert(game.id);
    },
  };
}
