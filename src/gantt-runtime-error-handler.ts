/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
import { formatGanttError, notifyGanttError } from './gantt-feedback';

export interface GanttRuntimeErrorHandlerDeps {
  resetInteraction: () => void;
  reportError?: (message: string) => void;
  logError?: (...args: unknown[]) => void;
}

/**
 * Logs a failure raised while handling a gesture, tells the user and puts the
 * chart back into its idle state so no bar is left half-dragged.
 */
export function createGanttRuntimeErrorHandler({
  resetInteraction,
  reportError = notifyGanttError,
  logError = console.error,
}: GanttRuntimeErrorHandlerDeps) {
  let isHandlingRuntimeError = false;

  return (context: string, error: unknown) => {
    logError(`[Gantt Runtime Error] ${context}:`, error);
    if (isHandlingRuntimeError) return;

    isHandlingRuntimeError = true;
    try {
      resetInteraction();
      reportError(formatGanttError(context, error));
    } catch (resetError) {
      logError('[Gantt Runtime Error] Failed to reset interaction cleanly:', resetError);
    } finally {
      isHandlingRuntimeError = false;
    }
  };
}
