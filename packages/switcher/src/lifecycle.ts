// packages/switcher/src/lifecycle.ts
import {
  extractErrorInfo,
  getRootLogger,
  isCardlaneError,
  runWithContext,
  type ComponentLogger,
  type TypedEmitter,
} from '@cardlane/infra';
import type { GameRecord, SwitcherSettings } from '@cardlane/types';
import type { MemoryCardSwitcher } from './switcher.js';

/** 호스트가 발생시키는 게임 수명주기 이벤트 */
export interface GameLifecycleEvents {
  'game:starting': (game: GameRecord) => void;
  'game:stopped': (game: GameRecord) => void;
}

/**
 * 수명주기 이벤트 → 스위처 연결
 *
 * 설정은 이벤트마다 getSettings()로 새로 읽는다.
 * 핸들러 예외는 로그만 남기고 이벤트 발생자로 전파하지 않는다.
 * 운영 에러(isOperational)는 warn, 그 밖의 예외는 error.
 *
 * @returns 구독 해제 함수
 */
export function bindSwitcherLifecycle(
  emitter: TypedEmitter<GameLifecycleEvents>,
  switcher: MemoryCardSwitcher,
  getSettings: () => SwitcherSettings,
  logger: ComponentLogger = getRootLogger().child('lifecycle'),
): () => void {
  function guarded(event: keyof GameLifecycleEvents, game: GameRecord, fn: () => void): void {
    runWithContext({ sessionId: game.id, event, startedAt: Date.now() }, () => {
      try {
        fn();
      } catch (error) {
        const info = extractErrorInfo(error);
        const message = `Failed to handle ${event} for "${game.name}": ${info.message}`;
        if (isCardlaneError(error) && error.isOperational) {
          logger.warn(message, { code: info.code, cause: info.cause });
        } else {
          logger.error(message, info);
        }
      }
    });
  }

  const onStarting = (game: GameRecord): void => {
    guarded('game:starting', game, () => {
      switcher.switchMemoryCard(game, getSettings());
    });
  };

  const onStopped = (game: GameRecord): void => {
    guarded('game:stopped', game, () => {
      switcher.restorePreviousCard(game, getSettings());
    });
  };

  emitter.on('game:starting', onStarting);
  emitter.on('game:stopped', onStopped);

  return () => {
    emitter.off('game:starting', onStarting);
    emitter.off('game:stopped', onStopped);
  };
}
