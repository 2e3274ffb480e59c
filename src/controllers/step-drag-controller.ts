/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
import type { GanttRpc, TimelineCoordinates } from '../types';
import type { GestureSink, NormalizedGesture } from '../gesture-input';
import { applyBarPercentGeometry, type BarRegistry } from '../bar-registry';
import {
  classifyBarZone,
  isResizeZone,
  locateBar,
  resolveStepDragMode,
  type StepDragMode,
} from '../bar-hit-test';
import { createClickDisambiguator } from '../click-disambiguator';
import type { GestureTimers } from '../scheduled-task';
import { isMovable, isResizable, type GanttSettings } from '../gantt-settings';
import {
  computeDraggedBarGeometry,
  getDragStyleName,
  isDragMode,
  isSameBarGeometry,
  resolveStepDragPhase,
  type BarPixelGeometry,
  type StepDragCapture,
  type StepDragPhase,
} from '../step-drag-state';
import { pixelToTimeRange, timeRangeToPercentagePosition } from '../timeline-geometry';
import { STYLE_MOVING, STYLE_RESIZING } from '../constants';

export interface GanttInteractionSnapshot {
  phase: StepDragPhase;
  mode: StepDragMode | null;
  barIndex: number | null;
}

export const IDLE_INTERACTION: GanttInteractionSnapshot = { phase: 'idle', mode: null, barIndex: null };

export function isSameInteractionSnapshot(a: GanttInteractionSnapshot, b: GanttInteractionSnapshot) {
  return a.phase === b.phase && a.mode === b.mode && a.barIndex === b.barIndex;
}

export interface StepDragControllerDeps {
  registry: Pick<BarRegistry, 'content' | 'indexOf' | 'isInvalid'>;
  rpc: GanttRpc;
  getTimeline: () => TimelineCoordinates;
  getSettings: () => GanttSettings;
  timers: GestureTimers;
  onRuntimeError: (context: string, error: unknown) => void;
  onInteractionChange?: (snapshot: GanttInteractionSnapshot) => void;
  logWarn?: (...args: unknown[]) => void;
  logDebug?: (...args: unknown[]) => void;
}

export interface StepDragController extends GestureSink {
  /** Reverts any captured bar and returns to idle without notifying. */
  reset: () => void;
  hasCapture: () => boolean;
}

function applyBarPixelGeometry(bar: HTMLElement, geometry: BarPixelGeometry) {
  bar.style.left = `${geometry.left}px`;
  bar.style.width = `${geometry.width}px`;
}

function removeDragStyles(bar: HTMLElement) {
  bar.classList.remove(STYLE_MOVING, STYLE_RESIZING);
}

export function createStepDragController(deps: StepDragControllerDeps): StepDragController {
  const { registry, rpc } = deps;
  const logWarn = deps.logWarn ?? console.warn;
  const logDebug = deps.logDebug ?? (() => undefined);

  // one live capture per chart
  let capture: StepDragCapture | null = null;

  const disambiguator = createClickDisambiguator({
    getIntervalMs: () => deps.getSettings().clickIntervalMs,
    timers: deps.timers,
    onError: deps.onRuntimeError,
    onClickIntervalElapsed: () => {
      if (!capture) return;
      const styleName = getDragStyleName(capture.mode);
      if (styleName) {
        capture.bar.classList.add(styleName);
      }
    },
  });

  function getSnapshot(): GanttInteractionSnapshot {
    if (!capture) return IDLE_INTERACTION;
    return {
      phase: resolveStepDragPhase(capture),
      mode: capture.mode,
      barIndex: registry.indexOf(capture.bar),
    };
  }

  function publish() {
    deps.onInteractionChange?.(getSnapshot());
  }

  function clearCapture() {
    capture = null;
    publish();
  }

  function notify(context: string, send: () => void) {
    try {
      send();
    } catch (error) {
      deps.onRuntimeError(context, error);
    }
  }

  function revertBar(released: StepDragCapture) {
    removeDragStyles(released.bar);
    applyBarPercentGeometry(released.bar, released.originalPercent);
    released.bar.style.backgroundColor = released.originalBackgroundColor;
  }

  function resolveBarIndex(bar: HTMLElement) {
    const index = registry.indexOf(bar);
    if (index < 0) {
      logWarn(`[Gantt] Step notification cancelled. Invalid bar index: ${index}`);
    }
    return index;
  }

  function reportClick(bar: HTMLElement) {
    if (!deps.getSettings().enabled) return;
    const index = resolveBarIndex(bar);
    if (index < 0) return;
    notify('Step click notification failed', () => rpc.stepClicked(index));
  }

  function commitDrag(released: StepDragCapture) {
    const timeline = deps.getTimeline();
    const { startTime, endTime } = pixelToTimeRange(timeline, released.appliedPx.left, released.appliedPx.width);
    // back to percentages so the bar scales with the track again
    applyBarPercentGeometry(released.bar, timeRangeToPercentagePosition(timeline, startTime, endTime));

    const index = resolveBarIndex(released.bar);
    if (index < 0) return;

    if (released.mode === 'move') {
      notify('Step move notification failed', () => rpc.onMove(index, startTime, endTime));
    } else {
      notify('Step resize notification failed', () => rpc.onResize(index, startTime, endTime));
    }
  }

  function finishDrag(released: StepDragCapture) {
    const changed =
      isDragMode(released.mode) && released.inProgress && !isSameBarGeometry(released.appliedPx, released.originalPx);
    if (!changed) {
      revertBar(released);
      return;
    }
    removeDragStyles(released.bar);
    released.bar.style.backgroundColor = released.originalBackgroundColor;
    commitDrag(released);
  }

  function updateHoverCursor(bar: HTMLElement, x: number) {
    const settings = deps.getSettings();
    const showResizeCursor =
      isResizable(settings) &&
      !registry.isInvalid(bar) &&
      isResizeZone(
        classifyBarZone(bar.getBoundingClientRect(), x, {
          resizable: true,
          handleWidthPx: settings.resizeHandleWidthPx,
        })
      );
    bar.style.cursor = showResizeCursor ? 'e-resize' : '';
  }

  function releaseCapture() {
    const released = capture;
    if (!released) return false;
    disambiguator.disarm();
    clearCapture();
    revertBar(released);
    return true;
  }

  function begin(gesture: NormalizedGesture) {
    // one gesture at a time; the live capture is left untouched
    if (capture) return false;
    const bar = locateBar(gesture.target, registry.content);
    if (!bar) return false;

    const settings = deps.getSettings();
    const originalPx = { left: bar.offsetLeft, width: bar.clientWidth };
    capture = {
      bar,
      capturePoint: gesture.point,
      lastPoint: gesture.point,
      originalPercent: { left: bar.style.left, width: bar.style.width },
      originalPx,
      appliedPx: originalPx,
      originalBackgroundColor: bar.style.backgroundColor,
      mode: resolveStepDragMode({
        bounds: bar.getBoundingClientRect(),
        x: gesture.point.x,
        invalid: registry.isInvalid(bar),
        movable: isMovable(settings),
        resizable: isResizable(settings),
        handleWidthPx: settings.resizeHandleWidthPx,
      }),
      inProgress: false,
    };
    disambiguator.arm();
    publish();
    return true;
  }

  function move(gesture: NormalizedGesture) {
    const hoveredBar = locateBar(gesture.target, registry.content);
    if (hoveredBar) {
      updateHoverCursor(hoveredBar, gesture.point.x);
    }

    const current = capture;
    if (!current) return false;

    current.lastPoint = gesture.point;
    disambiguator.markDragged();

    const deltaX = gesture.point.x - current.capturePoint.x;
    logDebug(`[Gantt] Position delta x: ${deltaX}px`);
    if (!isDragMode(current.mode)) return true;

    current.inProgress = deltaX !== 0;
    const styleName = getDragStyleName(current.mode);
    if (styleName) {
      current.bar.classList.add(styleName);
    }
    const geometry = computeDraggedBarGeometry(
      current.mode,
      current.originalPx,
      deltaX,
      deps.getSettings().minBarWidthPx
    );
    if (geometry) {
      applyBarPixelGeometry(current.bar, geometry);
      current.appliedPx = geometry;
    }
    current.bar.style.backgroundColor = '';
    publish();
    return true;
  }

  function end(gesture: NormalizedGesture) {
    const released = capture;
    if (!released) return false;

    const isClick =
      locateBar(gesture.target, registry.content) === released.bar && disambiguator.isClickCandidate();
    disambiguator.disarm();
    clearCapture();

    if (isClick) {
      reportClick(released.bar);
    } else {
      finishDrag(released);
    }
    return true;
  }

  return {
    begin,
    move,
    end,
    cancel: releaseCapture,
    reset: () => {
      releaseCapture();
    },
    hasCapture: () => capture !== null,
  };
}
