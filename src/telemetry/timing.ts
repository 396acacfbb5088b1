import { logger } from '../config/logger';

export interface Timer {
  /** Stops the clock, logs the duration with the timer's context and returns it. */
  stop(extra?: Record<string, unknown>): number;
}

/**
 * Timing helper for measuring operation durations.
 * Usage:
 *   const timer = startTimer('service.sync', { requestId });
 *   await runSync(...);
 *   timer.stop({ inserted }); // logs and returns durationMs
 */
export function startTimer(label: string, context: Record<string, unknown> = {}): Timer {
  const start = performance.now();

  return {
    stop(extra = {}): number {
      const durationMs = Math.round(performance.now() - start);
      logger.debug({ label, durationMs, ...context, ...extra }, 'Timer completed');
      return durationMs;
    },
  };
}
