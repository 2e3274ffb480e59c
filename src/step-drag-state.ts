/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
import type { StepDragMode } from './bar-hit-test';
import type { GesturePoint } from './types';
import { STYLE_MOVING, STYLE_RESIZING } from './constants';

export interface BarPixelGeometry {
  left: number;
  width: number;
}

/** Inline style values of a bar at rest, usually percentages of the track. */
export interface BarPercentGeometry {
  left: string;
  width: string;
}

export type StepDragPhase = 'idle' | 'captured' | 'dragging';

export interface StepDragCapture {
  bar: HTMLElement;
  capturePoint: GesturePoint;
  lastPoint: GesturePoint;
  originalPercent: BarPercentGeometry;
  originalPx: BarPixelGeometry;
  appliedPx: BarPixelGeometry;
  originalBackgroundColor: string;
  mode: StepDragMode;
  inProgress: boolean;
}

export function isDragMode(mode: StepDragMode) {
  return mode !== 'none';
}

export function getDragStyleName(mode: StepDragMode) {
  if (mode === 'move') return STYLE_MOVING;
  if (mode === 'resize-left' || mode === 'resize-right') return STYLE_RESIZING;
  return null;
}

export function resolveStepDragPhase(capture: Pick<StepDragCapture, 'inProgress'> | null): StepDragPhase {
  if (!capture) return 'idle';
  return capture.inProgress ? 'dragging' : 'captured';
}

/**
 * Live geometry for a horizontal delta measured from the capture point. Returns
 * null when the update must be dropped: resizing below the minimum width, or a
 * mode that never drags.
 */
export function computeDraggedBarGeometry(
  mode: StepDragMode,
  origin: BarPixelGeometry,
  deltaX: number,
  minWidthPx: number
): BarPixelGeometry | null {
  if (mode === 'resize-left') {
    const width = origin.width - deltaX;
    if (width < minWidthPx) return null;
    return { left: origin.left + deltaX, width };
  }
  if (mode === 'resize-right') {
    const width = origin.width + deltaX;
    if (width < minWidthPx) return null;
    return { left: origin.left, width };
  }
  if (mode === 'move') {
    return { left: origin.left + deltaX, width: origin.width };
  }
  return null;
}

export function isSameBarGeometry(a: BarPixelGeometry, b: BarPixelGeometry) {
  return a.left === b.left && a.width === b.width;
}
