/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */

export interface GestureTimers {
  setTimeoutFn: (callback: () => void, delayMs: number) => number;
  clearTimeoutFn: (id: number) => void;
}

export const browserTimers: GestureTimers = {
  setTimeoutFn: (callback, delayMs) => window.setTimeout(callback, delayMs),
  clearTimeoutFn: (id) => window.clearTimeout(id),
};

export interface ScheduledTaskInput {
  getDelayMs: () => number;
  callback: () => void;
  context: string;
  onError: (context: string, error: unknown) => void;
  timers: GestureTimers;
}

/** A cancellable one-shot timeout. Scheduling again replaces the pending run. */
export interface ScheduledTask {
  schedule: () => void;
  cancel: () => void;
  isPending: () => boolean;
}

export function createScheduledTask({
  getDelayMs,
  callback,
  context,
  onError,
  timers,
}: ScheduledTaskInput): ScheduledTask {
  let timeoutId: number | null = null;

  const cancel = () => {
    if (timeoutId === null) return;
    timers.clearTimeoutFn(timeoutId);
    timeoutId = null;
  };

  const schedule = () => {
    cancel();
    const scheduledId = timers.setTimeoutFn(() => {
      if (timeoutId !== scheduledId) return;
      timeoutId = null;
      try {
        callback();
      } catch (error) {
        onError(context, error);
      }
    }, getDelayMs());
    timeoutId = scheduledId;
  };

  return {
    schedule,
    cancel,
    isPending: () => timeoutId !== null,
  };
}
