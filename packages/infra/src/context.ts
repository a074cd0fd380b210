// packages/infra/src/context.ts
import { AsyncLocalStorage } from 'node:async_hooks';

/** 라이프사이클 이벤트별 로그 컨텍스트 */
export interface LogContext {
  /** 오버라이드 세션 식별자 (게임 ID) */
  sessionId: string;
  /** 컨텍스트를 연 이벤트 이름 */
  event?: string;
  startedAt: number;
}

const als = new AsyncLocalStorage<LogContext>();

/** 컨텍스트를 주입하고 콜백 실행 */
export function runWithContext<T>(ctx: LogContext, fn: () => T): T {
  return als.run(ctx, fn);
}

/** 현재 컨텍스트 조회 (없으면 undefined) */
export function getContext(): LogContext | undefined {
  return als.getStore();
}
