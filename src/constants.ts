/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */

// --- INTERACTION CONSTANTS ---
export const RESIZE_HANDLE_WIDTH_PX = 10;
export const BAR_MIN_WIDTH_PX = RESIZE_HANDLE_WIDTH_PX;
export const CLICK_INTERVAL_MS = 250;
export const POINTER_TOUCH_DETECTION_INTERVAL_MS = 100;

// --- TIMELINE CONSTANTS ---
export const DEFAULT_TIMELINE_LOCALE = 'en-US';
export const TIMELINE_MIN_CELL_WIDTH_PX: Record<'hour' | 'day' | 'week', number> = {
  hour: 24,
  day: 32,
  week: 48,
};

// --- STYLE NAMES ---
export const STYLE_GANTT = 'gantt';
export const STYLE_GANTT_CONTAINER = 'gantt-container';
export const STYLE_GANTT_CONTENT = 'gantt-content';
export const STYLE_BAR = 'bar';
export const STYLE_BAR_LABEL = 'bar-label';
export const STYLE_MOVING = 'moving';
export const STYLE_RESIZING = 'resizing';
export const STYLE_INVALID = 'invalid';
export const STYLE_TIMELINE = 'timeline';
export const STYLE_TIMELINE_CELL = 'timeline-cell';
