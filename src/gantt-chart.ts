/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
import type { GanttRpc, GanttTimeline, StepData, TimelineRange } from './types';
import {
  detectGestureInputCapabilities,
  isMovable,
  isResizable,
  normalizeGanttSettings,
  resolveGestureInputModel,
  type GanttSettings,
  type GestureInputCapabilities,
  type GestureInputModel,
} from './gantt-settings';
import { bindGestureInput } from './gesture-input';
import { browserTimers, type GestureTimers } from './scheduled-task';
import { createBarRegistry } from './bar-registry';
import { createLinearTimeline } from './linear-timeline';
import { isValidStepRange } from './timeline-geometry';
import { createSignal, type Signal } from './reactive/signal';
import { createGanttRuntimeErrorHandler } from './gantt-runtime-error-handler';
import {
  createStepDragController,
  IDLE_INTERACTION,
  isSameInteractionSnapshot,
  type GanttInteractionSnapshot,
} from './controllers/step-drag-controller';
import { STYLE_GANTT, STYLE_GANTT_CONTAINER, STYLE_GANTT_CONTENT } from './constants';

export interface GanttChartOptions {
  rpc: GanttRpc;
  settings?: Partial<GanttSettings>;
  /** Defaults to a linear timeline over the content width. */
  timeline?: GanttTimeline;
  capabilities?: GestureInputCapabilities;
  timers?: GestureTimers;
  reportError?: (message: string) => void;
  logWarn?: (...args: unknown[]) => void;
  logError?: (...args: unknown[]) => void;
  logDebug?: (...args: unknown[]) => void;
}

export interface GanttChart {
  readonly element: HTMLElement;
  readonly inputModel: GestureInputModel;
  readonly interaction: Signal<GanttInteractionSnapshot>;
  setRange: (range: TimelineRange) => void;
  update: (steps: Iterable<StepData>) => void;
  setEnabled: (enabled: boolean) => void;
  isEnabled: () => boolean;
  setMovableSteps: (movable: boolean) => void;
  isMovableSteps: () => boolean;
  setResizableSteps: (resizable: boolean) => void;
  isResizableSteps: () => boolean;
  notifyHeightChanged: (height: number) => void;
  notifyWidthChanged: () => void;
  destroy: () => void;
}

export function createGanttChart(root: HTMLElement, options: GanttChartOptions): GanttChart {
  const ownerDocument = root.ownerDocument;
  const logWarn = options.logWarn ?? console.warn;
  let settings = normalizeGanttSettings(options.settings);

  const element = ownerDocument.createElement('div');
  element.className = STYLE_GANTT;
  const container = ownerDocument.createElement('div');
  container.className = STYLE_GANTT_CONTAINER;
  const content = ownerDocument.createElement('div');
  content.className = STYLE_GANTT_CONTENT;
  container.appendChild(content);

  const timeline =
    options.timeline ?? createLinearTimeline({ getTrackWidth: () => content.clientWidth, ownerDocument });
  element.append(timeline.element, container);
  root.appendChild(element);

  const registry = createBarRegistry(content);
  const interaction = createSignal<GanttInteractionSnapshot>(IDLE_INTERACTION, isSameInteractionSnapshot);
  const timers = options.timers ?? browserTimers;

  let range: TimelineRange | null = null;
  let steps: StepData[] = [];
  let wasOverflowing = false;

  const handleRuntimeError = createGanttRuntimeErrorHandler({
    resetInteraction: () => controller.reset(),
    reportError: options.reportError,
    logError: options.logError,
  });

  const controller = createStepDragController({
    registry,
    rpc: options.rpc,
    getTimeline: () => timeline,
    getSettings: () => settings,
    timers,
    onRuntimeError: handleRuntimeError,
    onInteractionChange: interaction.set,
    logWarn,
    logDebug: options.logDebug,
  });

  const inputModel = resolveGestureInputModel(
    settings.inputModel,
    options.capabilities ?? detectGestureInputCapabilities()
  );
  const binding = bindGestureInput(container, inputModel, controller, {
    detectionIntervalMs: settings.pointerTouchDetectionIntervalMs,
    timers,
    onError: handleRuntimeError,
  });

  const onContainerScroll = () => {
    timeline.setScrollLeft(container.scrollLeft);
  };
  container.addEventListener('scroll', onContainerScroll);

  const render = () => {
    if (!range) return;
    if (!isValidStepRange(range.startTime, range.endTime)) {
      registry.clear();
      logWarn(`[Gantt] Invalid chart range: ${range.startTime} - ${range.endTime}. Nothing rendered.`);
      return;
    }
    timeline.update(range);
    content.style.minWidth = `${timeline.getMinWidth()}px`;
    const contentHeight = registry.render(steps, timeline);
    content.style.height = `${contentHeight}px`;
    wasOverflowing = timeline.isOverflowingHorizontally();
  };

  return {
    element,
    inputModel,
    interaction,
    setRange(nextRange) {
      range = { ...nextRange };
      render();
    },
    update(nextSteps) {
      steps = Array.from(nextSteps);
      render();
    },
    setEnabled(enabled) {
      settings = { ...settings, enabled };
    },
    isEnabled: () => settings.enabled,
    setMovableSteps(movable) {
      settings = { ...settings, movableSteps: movable };
    },
    isMovableSteps: () => isMovable(settings),
    setResizableSteps(resizable) {
      settings = { ...settings, resizableSteps: resizable };
    },
    isResizableSteps: () => isResizable(settings),
    notifyHeightChanged(height) {
      const containerHeight = Math.max(0, height - timeline.element.clientHeight);
      container.style.height = `${containerHeight}px`;
    },
    notifyWidthChanged() {
      const overflowing = timeline.isOverflowingHorizontally();
      if (overflowing === wasOverflowing) return;
      wasOverflowing = overflowing;
      if (!overflowing) {
        timeline.setScrollLeft(0);
      }
      timeline.updateWidths();
    },
    destroy() {
      controller.reset();
      binding.unbind();
      container.removeEventListener('scroll', onContainerScroll);
      registry.clear();
      element.remove();
    },
  };
}
