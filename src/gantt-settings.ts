/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
import {
  BAR_MIN_WIDTH_PX,
  CLICK_INTERVAL_MS,
  POINTER_TOUCH_DETECTION_INTERVAL_MS,
  RESIZE_HANDLE_WIDTH_PX,
} from './constants';

export type GestureInputModel = 'mouse' | 'touch' | 'pointer';
export type GestureInputModelSetting = GestureInputModel | 'auto';

export interface GanttSettings {
  enabled: boolean;
  movableSteps: boolean;
  resizableSteps: boolean;
  inputModel: GestureInputModelSetting;
  resizeHandleWidthPx: number;
  minBarWidthPx: number;
  clickIntervalMs: number;
  pointerTouchDetectionIntervalMs: number;
}

export interface GestureInputCapabilities {
  pointerEvents: boolean;
  maxTouchPoints: number;
  touchEvents: boolean;
}

export const DEFAULT_GANTT_SETTINGS: Readonly<GanttSettings> = {
  enabled: true,
  movableSteps: true,
  resizableSteps: true,
  inputModel: 'auto',
  resizeHandleWidthPx: RESIZE_HANDLE_WIDTH_PX,
  minBarWidthPx: BAR_MIN_WIDTH_PX,
  clickIntervalMs: CLICK_INTERVAL_MS,
  pointerTouchDetectionIntervalMs: POINTER_TOUCH_DETECTION_INTERVAL_MS,
};

export function normalizeGestureInputModelSetting(value: unknown): GestureInputModelSetting {
  if (value === 'mouse' || value === 'touch' || value === 'pointer') return value;
  return 'auto';
}

function normalizeNonNegativeNumber(value: unknown, fallback: number) {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) return fallback;
  return value;
}

function normalizeBoolean(value: unknown, fallback: boolean) {
  return typeof value === 'boolean' ? value : fallback;
}

export function normalizeGanttSettings(partial: Partial<Record<keyof GanttSettings, unknown>> = {}): GanttSettings {
  return {
    enabled: normalizeBoolean(partial.enabled, DEFAULT_GANTT_SETTINGS.enabled),
    movableSteps: normalizeBoolean(partial.movableSteps, DEFAULT_GANTT_SETTINGS.movableSteps),
    resizableSteps: normalizeBoolean(partial.resizableSteps, DEFAULT_GANTT_SETTINGS.resizableSteps),
    inputModel: normalizeGestureInputModelSetting(partial.inputModel),
    resizeHandleWidthPx: normalizeNonNegativeNumber(
      partial.resizeHandleWidthPx,
      DEFAULT_GANTT_SETTINGS.resizeHandleWidthPx
    ),
    minBarWidthPx: normalizeNonNegativeNumber(partial.minBarWidthPx, DEFAULT_GANTT_SETTINGS.minBarWidthPx),
    clickIntervalMs: normalizeNonNegativeNumber(partial.clickIntervalMs, DEFAULT_GANTT_SETTINGS.clickIntervalMs),
    pointerTouchDetectionIntervalMs: normalizeNonNegativeNumber(
      partial.pointerTouchDetectionIntervalMs,
      DEFAULT_GANTT_SETTINGS.pointerTouchDetectionIntervalMs
    ),
  };
}

export function isMovable(settings: Pick<GanttSettings, 'enabled' | 'movableSteps'>) {
  return settings.enabled && settings.movableSteps;
}

export function isResizable(settings: Pick<GanttSettings, 'enabled' | 'resizableSteps'>) {
  return settings.enabled && settings.resizableSteps;
}

/** Picks the single input model the chart listens to. Decided once, at setup. */
export function resolveGestureInputModel(
  setting: GestureInputModelSetting,
  capabilities: GestureInputCapabilities
): GestureInputModel {
  if (setting !== 'auto') return setting;
  if (capabilities.pointerEvents && capabilities.maxTouchPoints > 0) return 'pointer';
  if (capabilities.touchEvents) return 'touch';
  return 'mouse';
}

export function detectGestureInputCapabilities(target: typeof globalThis = globalThis): GestureInputCapabilities {
  const maxTouchPoints =
    typeof target.navigator === 'object' && typeof target.navigator.maxTouchPoints === 'number'
      ? target.navigator.maxTouchPoints
      : 0;
  return {
    pointerEvents: typeof target.PointerEvent === 'function',
    maxTouchPoints,
    touchEvents: 'ontouchstart' in target,
  };
}
