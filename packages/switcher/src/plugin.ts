// packages/switcher/src/plugin.ts
import { createSettingsIO, type SettingsIO } from '@cardlane/config';
import {
  createLogger,
  createTypedEmitter,
  getEnv,
  getRootLogger,
  isTruthyEnvValue,
  type CardlaneLogger,
  type TypedEmitter,
} from '@cardlane/infra';
import type { SwitcherSettings } from '@cardlane/types';
import { bindSwitcherLifecycle, type GameLifecycleEvents } from './lifecycle.js';
import {
  createMemoryCardManager,
  type GameLibrary,
  type MemoryCardCreationResult,
  type MemoryCardManager,
} from './memory-cards.js';
import { createOverrideSession, type OverrideSession } from './override-session.js';
import type { OverrideSlotStore } from './slot-store.js';
import { createMemoryCardSwitcher, type MemoryCardSwitcher } from './switcher.js';

export interface CardlaneDeps {
  library: GameLibrary;
  settingsIO?: SettingsIO;
  events?: TypedEmitter<GameLifecycleEvents>;
  /** 미지정 시 설정의 logging.level로 생성 (CARDLANE_LOG_FILE=1이면 파일에도 기록) */
  logger?: CardlaneLogger;
  store?: OverrideSlotStore;
}

export interface Cardlane {
  readonly events: TypedEmitter<GameLifecycleEvents>;
  readonly session: OverrideSession;
  readonly cards: MemoryCardManager;
  readonly switcher: MemoryCardSwitcher;
  /** 현재 설정 (이벤트 처리에 사용되는 값) */
  settings(): SwitcherSettings;
  /** 설정 저장 후 다음 이벤트부터 적용 */
  saveSettings(settings: SwitcherSettings): void;
  /** 현재 설정으로 일괄 생성 */
  createMemoryCards(): MemoryCardCreationResult;
  /** 이벤트 구독 해제 + 로그 flush */
  dispose(): Promise<void>;
}

/**
 * 조립 루트
 *
 * 설정 로드 → 로거 → 카드 관리자/세션/스위처 → 수명주기 바인딩 순.
 */
export function createCardlane(deps: CardlaneDeps): Cardlane {
  const settingsIO =
    deps.settingsIO ?? createSettingsIO({ logger: getRootLogger().child('settings') });
  let current = settingsIO.loadSettings();

  const logger =
    deps.logger ??
    createLogger({
      name: 'cardlane',
      level: current.logging.level,
      file: { enabled: isTruthyEnvValue(getEnv('LOG_FILE')) },
    });
  const events = deps.events ?? createTypedEmitter<GameLifecycleEvents>();

  const cards = createMemoryCardManager({
    library: deps.library,
    logger: logger.child('memory-cards'),
  });
  const session = createOverrideSession({
    store: deps.store,
    logger: logger.child('override-session'),
  });
  const switcher = createMemoryCardSwitcher({
    session,
    cards,
    logger: logger.child('switcher'),
  });
  const unbind = bindSwitcherLifecycle(
    events,
    switcher,
    () => current,
    logger.child('lifecycle'),
  );

  logger.info(`cardlane ready (settings: ${settingsIO.settingsPath})`);

  return {
    events,
    session,
    cards,
    switcher,
    settings: () => current,
    saveSettings(settings) {
      settingsIO.saveSettings(settings);
      current = settings;
    },
    createMemoryCards() {
      return cards.createMemoryCards(
        cards.resolvePlatformId(current.platformId),
        current.templateMemoryCardPath,
        current.outputFolderPath,
      );
    },
    async dispose() {
      unbind();
      await logger.flush();
    },
  };
}
