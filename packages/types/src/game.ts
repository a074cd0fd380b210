import type { Brand } from './common.js';

/** 게임 ID (호스트 라이브러리가 부여하는 불투명 식별자) */
export type GameId = Brand<string, 'GameId'>;

/** 플랫폼 ID */
export type PlatformId = Brand<string, 'PlatformId'>;

/** 호스트 라이브러리의 게임 레코드 */
export interface GameRecord {
  readonly id: GameId;
  readonly name: string;
  readonly platformIds?: readonly PlatformId[];
}

/** 호스트 라이브러리의 플랫폼 레코드 */
export interface PlatformRecord {
  readonly id: PlatformId;
  readonly name: string;
}

export function createGameId(id: string): GameId {
  return id as GameId;
}

export function createPlatformId(id: string): PlatformId {
  return id as PlatformId;
}
