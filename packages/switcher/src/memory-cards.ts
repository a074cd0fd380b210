// packages/switcher/src/memory-cards.ts
import {
  copyFileExclusiveSync,
  ensureDirSync,
  fileExists,
  getRootLogger,
  toError,
  type ComponentLogger,
} from '@cardlane/infra';
import {
  err,
  ok,
  type GameRecord,
  type PlatformId,
  type PlatformRecord,
  type Result,
} from '@cardlane/types';
import * as path from 'node:path';
import { MemoryCardError } from './errors.js';

/** 플랫폼 미설정 시 자동 탐지할 이름 */
export const PS2_PLATFORM_NAME = 'Sony PlayStation 2';

/** 템플릿에 확장자가 없을 때 */
export const DEFAULT_CARD_EXTENSION = '.ps2';

/** 호스트 게임 라이브러리 (읽기 전용) */
export interface GameLibrary {
  games(): readonly GameRecord[];
  platforms(): readonly PlatformRecord[];
}

/** 설정된 플랫폼 또는 자동 탐지 */
export interface PlatformResolver {
  resolvePlatformId(configured?: PlatformId): PlatformId | undefined;
}

/** 일괄 생성 결과 */
export class MemoryCardCreationResult {
  totalGames = 0;
  createdCount = 0;
  skippedCount = 0;
  failedCount = 0;
  readonly errors: string[] = [];
  readonly notes: string[] = [];

  addError(message: string): void {
    if (message.trim() !== '') {
      this.errors.push(message);
    }
  }

  addNote(message: string): void {
    if (message.trim() !== '') {
      this.notes.push(message);
    }
  }

  /** 사용자에게 보여줄 요약 */
  buildSummaryMessage(): string {
    const lines = [
      `Games scanned: ${this.totalGames}`,
      `Created: ${this.createdCount}`,
      `Skipped (already exists): ${this.skippedCount}`,
      `Failed: ${this.failedCount}`,
    ];
    if (this.notes.length > 0) {
      lines.push('', 'Notes:', ...this.notes);
    }
    if (this.errors.length > 0) {
      lines.push('', 'Errors:', ...this.errors);
    }
    return lines.join('\n').trim();
  }
}

export interface MemoryCardManager extends PlatformResolver {
  /** 플랫폼의 모든 게임에 템플릿을 복사 (기존 파일은 건너뜀) */
  createMemoryCards(
    platformId: PlatformId | undefined,
    templatePath: string,
    outputFolder: string,
  ): MemoryCardCreationResult;
  /** 일괄 생성 시 이 게임이 받을 파일 이름 (플랫폼에 없으면 undefined) */
  getMemoryCardFileName(
    platformId: PlatformId,
    game: GameRecord,
    templatePath: string,
  ): string | undefined;
  /** 템플릿 한 장 복사 (덮어쓰지 않음) */
  createMemoryCard(destinationPath: string, templatePath: string): Result<void, MemoryCardError>;
}

export interface MemoryCardManagerDeps {
  library: GameLibrary;
  logger?: ComponentLogger;
}

const INVALID_FILE_NAME_CHARS = /[<>:"/\\|?*\u0000-\u001f]/g;

/** 파일 이름에 쓸 수 없는 문자를 _ 로 치환 */
export function getSafeFileName(name: string): string {
  return name.trim().replace(INVALID_FILE_NAME_CHARS, '_').trim();
}

/**
 * 게임별 카드 파일 이름
 *
 * 이름이 비면 게임 ID를 쓰고, 대소문자 무시로 겹치면 ID 앞 8자를 덧붙인다.
 * usedNames는 호출 간에 누적된다.
 */
export function buildMemoryCardFileName(
  game: GameRecord,
  extension: string,
  usedNames: Set<string>,
): string {
  const safeName = getSafeFileName(game.name) || game.id;
  const fileName = `${safeName}${extension}`;
  if (claim(usedNames, fileName)) {
    return fileName;
  }

  const uniqueName = `${safeName}_${shortId(game.id)}${extension}`;
  claim(usedNames, uniqueName);
  return uniqueName;
}

export function getTemplateExtension(templatePath: string): string {
  const extension = path.extname(templatePath);
  return extension.trim() === '' ? DEFAULT_CARD_EXTENSION : extension;
}

export function createMemoryCardManager(deps: MemoryCardManagerDeps): MemoryCardManager {
  const { library } = deps;
  const logger = deps.logger ?? getRootLogger().child('memory-cards');

  /** 이름(대소문자 무시) → ID 순 */
  function gamesForPlatform(platformId: PlatformId): GameRecord[] {
    return library
      .games()
      .filter((game) => game.platformIds?.includes(platformId) === true)
      .toSorted(
        (a, b) =>
          compareOrdinal(a.name.toUpperCase(), b.name.toUpperCase()) || compareOrdinal(a.id, b.id),
      );
  }

  function createMemoryCard(
    destinationPath: string,
    templatePath: string,
  ): Result<void, MemoryCardError> {
    if (!fileExists(templatePath)) {
      return err(
        new MemoryCardError(
          'Template memory card file is missing or invalid.',
          'MEMORY_CARD_TEMPLATE_INVALID',
          { details: { templatePath } },
        ),
      );
    }
    try {
      copyFileExclusiveSync(templatePath, destinationPath);
      return ok(undefined);
    } catch (cause) {
      return err(
        new MemoryCardError(
          `Failed to create memory card from template: ${toError(cause).message}`,
          'MEMORY_CARD_COPY_FAILED',
          { cause: toError(cause), details: { destinationPath } },
        ),
      );
    }
  }

  return {
    resolvePlatformId(configured) {
      if (configured && configured.trim() !== '') {
        return configured;
      }
      const detected = library
        .platforms()
        .find((platform) => platform.name.trim().toUpperCase() === PS2_PLATFORM_NAME.toUpperCase());
      return detected?.id;
    },

    createMemoryCards(platformId, templatePath, outputFolder) {
      const result = new MemoryCardCreationResult();
      if (!platformId || platformId.trim() === '') {
        result.addError('Please select a platform.');
      }
      if (!fileExists(templatePath)) {
        result.addError('Template memory card file is missing or invalid.');
      }
      if (outputFolder.trim() === '') {
        result.addError('Please select an output folder.');
      }
      if (!platformId || result.errors.length > 0) {
        return result;
      }

      const games = gamesForPlatform(platformId);
      result.totalGames = games.length;
      if (games.length === 0) {
        result.addNote('No games found for the selected platform.');
        return result;
      }

      ensureDirSync(outputFolder);
      const usedNames = new Set<string>();
      const extension = getTemplateExtension(templatePath);
      for (const game of games) {
        const destinationPath = path.join(
          outputFolder,
          buildMemoryCardFileName(game, extension, usedNames),
        );
        if (fileExists(destinationPath)) {
          result.skippedCount++;
          continue;
        }
        try {
          copyFileExclusiveSync(templatePath, destinationPath);
          result.createdCount++;
        } catch (cause) {
          result.failedCount++;
          result.addError(
            `Failed to create memory card for "${game.name}": ${toError(cause).message}`,
          );
        }
      }

      logger.info(
        `Memory cards: ${result.createdCount} created, ` +
          `${result.skippedCount} skipped, ${result.failedCount} failed`,
      );
      return result;
    },

    getMemoryCardFileName(platformId, game, templatePath) {
      const usedNames = new Set<string>();
      const extension = getTemplateExtension(templatePath);
      for (const candidate of gamesForPlatform(platformId)) {
        const fileName = buildMemoryCardFileName(candidate, extension, usedNames);
        if (candidate.id === game.id) {
          return fileName;
        }
      }
      return undefined;
    },

    createMemoryCard,
  };
}

function claim(usedNames: Set<string>, fileName: string): boolean {
  const key = fileName.toUpperCase();
  if (usedNames.has(key)) {
    return false;
  }
  usedNames.add(key);
  return true;
}

function shortId(id: string): string {
  return id.replace(/-/g, '').slice(0, 8);
}

function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
