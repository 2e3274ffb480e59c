/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
import { createScheduledTask, type GestureTimers } from './scheduled-task';

export interface ClickDisambiguatorDeps {
  getIntervalMs: () => number;
  timers: GestureTimers;
  /** Runs when the press outlived the click interval without being released. */
  onClickIntervalElapsed: () => void;
  onError: (context: string, error: unknown) => void;
}

export interface ClickDisambiguator {
  arm: () => void;
  markDragged: () => void;
  disarm: () => void;
  isClickCandidate: () => boolean;
}

export function createClickDisambiguator(deps: ClickDisambiguatorDeps): ClickDisambiguator {
  let clickCandidate = true;

  const disallowClickTask = createScheduledTask({
    getDelayMs: deps.getIntervalMs,
    context: 'click interval',
    onError: deps.onError,
    timers: deps.timers,
    callback: () => {
      clickCandidate = false;
      deps.onClickIntervalElapsed();
    },
  });

  return {
    arm() {
      clickCandidate = true;
      disallowClickTask.schedule();
    },
    markDragged() {
      disallowClickTask.cancel();
      clickCandidate = false;
    },
    disarm() {
      disallowClickTask.cancel();
      clickCandidate = true;
    },
    isClickCandidate: () => clickCandidate,
  };
}
