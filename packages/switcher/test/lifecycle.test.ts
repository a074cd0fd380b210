import { getDefaults } from '@cardlane/config';
import {
  CardlaneError,
  createTypedEmitter,
  getContext,
  type LogContext,
  type TypedEmitter,
} from '@cardlane/infra';
import type { SwitcherSettings } from '@cardlane/types';
import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import type { MemoryCardSwitcher, SwitchOutcome } from '../src/switcher.js';
import { bindSwitcherLifecycle, type GameLifecycleEvents } from '../src/lifecycle.js';
import { createFakeLogger, makeGame } from './helpers.js';

const okami = makeGame('okami-id', 'Okami');
const skipped: SwitchOutcome = { status: 'skipped', reason: 'disabled' };

describe('bindSwitcherLifecycle', () => {
  let events: TypedEmitter<GameLifecycleEvents>;
  let switcher: {
    switchMemoryCard: Mock<MemoryCardSwitcher['switchMemoryCard']>;
    restorePreviousCard: Mock<MemoryCardSwitcher['restorePreviousCard']>;
  };
  let logger: ReturnType<typeof createFakeLogger>;
  let current: SwitcherSettings;

  beforeEach(() => {
    events = createTypedEmitter<GameLifecycleEvents>();
    switcher = {
      switchMemoryCard: vi.fn<MemoryCardSwitcher['switchMemoryCard']>(() => skipped),
      restorePreviousCard: vi.fn<MemoryCardSwitcher['restorePreviousCard']>(() => 'skipped'),
    };
    logger = createFakeLogger();
    current = { ...getDefaults() };
  });

  function bind(): () => void {
    return bindSwitcherLifecycle(events, switcher, () => current, logger);
  }

  it('game:starting → switchMemoryCard', () => {
    bind();
    events.emit('game:starting', okami);
    expect(switcher.switchMemoryCard).toHaveBeenCalledWith(okami, current);
    expect(switcher.restorePreviousCard).not.toHaveBeenCalled();
  });

  it('game:stopped → restorePreviousCard', () => {
    bind();
    events.emit('game:stopped', okami);
    expect(switcher.restorePreviousCard).toHaveBeenCalledWith(okami, current);
  });

  it('이벤트마다 설정을 새로 읽는다', () => {
    bind();
    const first = current;
    events.emit('game:starting', okami);
    current = { ...first, restoreOnExit: false };
    events.emit('game:stopped', okami);
    expect(switcher.switchMemoryCard.mock.calls[0][1]).toBe(first);
    expect(switcher.restorePreviousCard.mock.calls[0][1]).toBe(current);
  });

  it('핸들러 안에서 세션 컨텍스트를 연다', () => {
    const seen: (LogContext | undefined)[] = [];
    switcher.switchMemoryCard.mockImplementation(() => {
      seen.push(getContext());
      return skipped;
    });
    bind();
    events.emit('game:starting', okami);
    expect(seen[0]?.sessionId).toBe('okami-id');
    expect(seen[0]?.event).toBe('game:starting');
    expect(getContext()).toBeUndefined();
  });

  it('핸들러 예외는 로그만 남긴다', () => {
    switcher.switchMemoryCard.mockImplementation(() => {
      throw new Error('boom');
    });
    bind();
    expect(() => events.emit('game:starting', okami)).not.toThrow();
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to handle game:starting for "Okami": boom',
      expect.objectContaining({ code: 'UNKNOWN', message: 'boom' }),
    );
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('운영 에러는 코드와 원인을 담아 warn으로 남긴다', () => {
    switcher.restorePreviousCard.mockImplementation(() => {
      throw new CardlaneError('restore failed', 'OVERRIDE_IO', { cause: new Error('EACCES') });
    });
    bind();
    events.emit('game:stopped', okami);
    expect(logger.warn).toHaveBeenCalledWith(
      'Failed to handle game:stopped for "Okami": restore failed',
      { code: 'OVERRIDE_IO', cause: 'EACCES' },
    );
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('구독 해제 후에는 호출하지 않는다', () => {
    const unbind = bind();
    unbind();
    events.emit('game:starting', okami);
    events.emit('game:stopped', okami);
    expect(switcher.switchMemoryCard).not.toHaveBeenCalled();
    expect(events.listenerCount('game:starting')).toBe(0);
    expect(events.listenerCount('game:stopped')).toBe(0);
  });
});
