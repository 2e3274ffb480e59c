/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */

type GanttErrorReporter = (message: string) => void;

let ganttErrorReporter: GanttErrorReporter | null = null;

export function setGanttErrorReporter(reporter: GanttErrorReporter | null) {
  ganttErrorReporter = reporter;
}

function getUnknownErrorMessage(error: unknown) {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  if (typeof error === 'string' && error.trim().length > 0) {
    return error;
  }
  return 'Unknown error';
}

export function formatGanttError(prefix: string, error: unknown) {
  return `${prefix}: ${getUnknownErrorMessage(error)}`;
}

export function notifyGanttError(message: string) {
  if (ganttErrorReporter) {
    ganttErrorReporter(message);
    return;
  }
  console.warn('Gantt error (no reporter configured):', message);
}
