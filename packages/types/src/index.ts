// @cardlane/types — barrel export
export type * from './common.js';
export type * from './game.js';
export type * from './settings.js';

// 런타임 헬퍼
export { ok, err } from './common.js';

// 브랜드 팩토리 함수
export { createGameId, createPlatformId } from './game.js';
