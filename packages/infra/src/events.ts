// packages/infra/src/events.ts
import { EventEmitter } from 'node:events';

/**
 * 이벤트 맵 타입: 이벤트명 → 핸들러 시그니처 매핑
 *
 * 사용 예:
 * ```typescript
 * interface GameEvents {
 *   'game:starting': (game: GameRecord) => void;
 * }
 * const emitter = createTypedEmitter<GameEvents>();
 * ```
 */
export type EventMap = Record<string, (...args: never[]) => void>;

/** 타입 안전 EventEmitter 래퍼 */
export interface TypedEmitter<T extends { [K in keyof T]: (...args: never[]) => void }> {
  on<K extends keyof T & string>(event: K, listener: T[K]): this;
  off<K extends keyof T & string>(event: K, listener: T[K]): this;
  once<K extends keyof T & string>(event: K, listener: T[K]): this;
  emit<K extends keyof T & string>(event: K, ...args: Parameters<T[K]>): boolean;
  removeAllListeners<K extends keyof T & string>(event?: K): this;
  listenerCount<K extends keyof T & string>(event: K): number;
}

/** TypedEmitter 팩토리 */
export function createTypedEmitter<
  T extends { [K in keyof T]: (...args: never[]) => void },
>(): TypedEmitter<T> {
  return new EventEmitter() as unknown as TypedEmitter<T>;
}
