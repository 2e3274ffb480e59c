/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
import { createGanttChart, type GanttChart } from './src/gantt-chart';
import { setGanttErrorReporter } from './src/gantt-feedback';
import type { GanttRpc, StepData, TimelineRange } from './src/types';

const DAY_MS = 24 * 60 * 60 * 1000;
const RANGE_START = Date.UTC(2024, 2, 4);

const demoRange: TimelineRange = {
  startTime: RANGE_START,
  endTime: RANGE_START + 21 * DAY_MS,
  resolution: 'day',
};

const demoSteps: StepData[] = [
  { caption: 'Kickoff', startTime: RANGE_START, endTime: RANGE_START + 2 * DAY_MS, backgroundColor: '#0ea5e9' },
  {
    caption: 'Prototype',
    startTime: RANGE_START + 2 * DAY_MS,
    endTime: RANGE_START + 8 * DAY_MS,
    backgroundColor: '#22c55e',
  },
  {
    caption: 'Review',
    startTime: RANGE_START + 9 * DAY_MS,
    endTime: RANGE_START + 11 * DAY_MS,
    backgroundColor: '#f59e0b',
  },
  {
    caption: 'Release',
    startTime: RANGE_START + 14 * DAY_MS,
    endTime: RANGE_START + 15 * DAY_MS,
    backgroundColor: '#ef4444',
  },
];

let globalErrorHandlersBound = false;

function setStatusText(text: string) {
  const statusBar = document.getElementById('statusBar');
  if (statusBar) {
    statusBar.textContent = text;
  }
}

function formatDay(time: number) {
  return new Date(time).toISOString().slice(0, 16).replace('T', ' ');
}

function reportGlobalRuntimeIssue(context: string, error: unknown) {
  console.error(`[Global Runtime Error] ${context}:`, error);
  setStatusText('Runtime error occurred. Check console.');
}

function bindGlobalErrorHandlers() {
  if (globalErrorHandlersBound) return;
  globalErrorHandlersBound = true;

  window.addEventListener('error', (event) => {
    reportGlobalRuntimeIssue(event.message || 'window.error', event.error ?? event.message);
  });

  window.addEventListener('unhandledrejection', (event) => {
    reportGlobalRuntimeIssue('unhandledrejection', event.reason);
  });
}

function createDemoRpc(getChart: () => GanttChart | null): GanttRpc {
  const applyRange = (index: number, startTime: number, endTime: number) => {
    const step = demoSteps[index];
    if (!step) return;
    demoSteps[index] = { ...step, startTime, endTime };
    getChart()?.update(demoSteps);
  };

  return {
    stepClicked(index) {
      setStatusText(`Clicked "${demoSteps[index]?.caption ?? index}"`);
    },
    onMove(index, startTime, endTime) {
      applyRange(index, startTime, endTime);
      setStatusText(`Moved to ${formatDay(startTime)} - ${formatDay(endTime)}`);
    },
    onResize(index, startTime, endTime) {
      applyRange(index, startTime, endTime);
      setStatusText(`Resized to ${formatDay(startTime)} - ${formatDay(endTime)}`);
    },
  };
}

function bindToggle(id: string, apply: (checked: boolean) => void) {
  const input = document.getElementById(id);
  if (!(input instanceof HTMLInputElement)) return;
  input.addEventListener('change', () => apply(input.checked));
}

function registerChart(root: HTMLElement) {
  let chart: GanttChart | null = null;
  chart = createGanttChart(root, { rpc: createDemoRpc(() => chart) });
  const ganttChart = chart;

  ganttChart.setRange(demoRange);
  ganttChart.update(demoSteps);

  ganttChart.interaction.subscribe((snapshot) => {
    const indicator = document.getElementById('interactionState');
    if (!indicator) return;
    indicator.textContent =
      snapshot.phase === 'idle' ? 'idle' : `${snapshot.phase} ${snapshot.mode ?? ''} #${snapshot.barIndex ?? '-'}`;
  });

  bindToggle('enabledToggle', (checked) => ganttChart.setEnabled(checked));
  bindToggle('movableToggle', (checked) => ganttChart.setMovableSteps(checked));
  bindToggle('resizableToggle', (checked) => ganttChart.setResizableSteps(checked));

  const resizeObserver = new ResizeObserver(() => {
    requestAnimationFrame(() => {
      ganttChart.notifyHeightChanged(root.clientHeight);
      ganttChart.notifyWidthChanged();
    });
  });
  resizeObserver.observe(root);
}

// --- INITIALIZATION ---
document.addEventListener('DOMContentLoaded', () => {
  try {
    bindGlobalErrorHandlers();
    setGanttErrorReporter(setStatusText);

    const root = document.getElementById('gantt');
    if (!root) {
      throw new Error('Missing #gantt element');
    }
    registerChart(root);
  } catch (error) {
    console.error('Application bootstrap failed:', error);
    setStatusText('Startup failed. Reload the page.');
  }
});
