import type { TypingTarget } from '@/lib/tutorial/typing';

export type IdleResult = 'idle' | 'timeout';

/**
 * A live interactive shell the tutorial types into. Faults reported by the
 * shell surface as `ExecutionError` from `execute` or `waitForIdle`.
 */
export interface LiveSession extends TypingTarget {
  waitForIdle(timeoutMs: number, signal?: AbortSignal): Promise<IdleResult>;
  /** Clears the visible screen after a failed segment. */
  clear(signal?: AbortSignal): Promise<void>;
}
