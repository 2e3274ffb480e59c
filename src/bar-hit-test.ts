/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */

export type BarZone = 'resize-left' | 'resize-right' | 'move';

/** `none` captures the bar for click routing only. */
export type StepDragMode = BarZone | 'none';

export interface HorizontalBounds {
  left: number;
  right: number;
}

export interface BarZoneOptions {
  resizable: boolean;
  handleWidthPx: number;
}

export interface StepDragModeInput extends BarZoneOptions {
  bounds: HorizontalBounds;
  x: number;
  invalid: boolean;
  movable: boolean;
}

/**
 * Resolves the bar under an event target: the target itself when it is a direct
 * child of the content element, or its parent when the target is a bar's child.
 */
export function locateBar(target: EventTarget | null, content: HTMLElement): HTMLElement | null {
  if (!(target instanceof Element)) return null;
  const parent = target.parentElement;
  if (parent === content) {
    return target instanceof HTMLElement ? target : null;
  }
  if (parent && parent.parentElement === content) {
    return parent;
  }
  return null;
}

export function classifyBarZone(bounds: HorizontalBounds, x: number, options: BarZoneOptions): BarZone {
  if (!options.resizable) return 'move';
  if (x <= bounds.left + options.handleWidthPx) return 'resize-left';
  if (x >= bounds.right - options.handleWidthPx) return 'resize-right';
  return 'move';
}

export function resolveStepDragMode(input: StepDragModeInput): StepDragMode {
  if (input.invalid) return 'none';
  const zone = classifyBarZone(input.bounds, input.x, input);
  if (zone === 'move' && !input.movable) return 'none';
  return zone;
}

export function isResizeZone(zone: BarZone) {
  return zone === 'resize-left' || zone === 'resize-right';
}
