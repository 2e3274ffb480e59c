/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
import type { StepData, TimelineCoordinates } from './types';
import { STYLE_BAR, STYLE_BAR_LABEL, STYLE_INVALID } from './constants';
import { isValidStepRange, timeRangeToPercentagePosition } from './timeline-geometry';
import type { BarPercentGeometry } from './step-drag-state';

export interface BarRegistry {
  readonly content: HTMLElement;
  /** Rebuilds every bar in step order and returns the summed bar height. */
  render: (steps: Iterable<StepData>, timeline: TimelineCoordinates) => number;
  clear: () => void;
  /** Index among the attached bars, or -1 once the bar has been detached by a re-render. */
  indexOf: (bar: Element) => number;
  barAt: (index: number) => HTMLElement | null;
  size: () => number;
  isInvalid: (bar: Element) => boolean;
}

export function applyBarPercentGeometry(bar: HTMLElement, geometry: BarPercentGeometry) {
  bar.style.left = geometry.left;
  bar.style.width = geometry.width;
}

export function createBarRegistry(content: HTMLElement): BarRegistry {
  const ownerDocument = content.ownerDocument;

  const clear = () => {
    while (content.lastChild) {
      content.removeChild(content.lastChild);
    }
  };

  const createBar = (step: StepData, timeline: TimelineCoordinates) => {
    const bar = ownerDocument.createElement('div');
    bar.className = STYLE_BAR;
    bar.style.backgroundColor = step.backgroundColor;

    const caption = ownerDocument.createElement('div');
    caption.className = STYLE_BAR_LABEL;
    caption.textContent = step.caption;
    bar.appendChild(caption);

    if (isValidStepRange(step.startTime, step.endTime)) {
      applyBarPercentGeometry(bar, timeRangeToPercentagePosition(timeline, step.startTime, step.endTime));
    } else {
      bar.classList.add(STYLE_INVALID);
    }
    return bar;
  };

  const render = (steps: Iterable<StepData>, timeline: TimelineCoordinates) => {
    clear();
    let contentHeight = 0;
    let index = 0;
    for (const step of steps) {
      const bar = createBar(step, timeline);
      content.appendChild(bar);
      // bar height comes from the stylesheet
      const height = bar.clientHeight;
      contentHeight += height;
      bar.style.top = `${index * height}px`;
      index++;
    }
    return contentHeight;
  };

  return {
    content,
    render,
    clear,
    indexOf: (bar) => Array.from(content.children).indexOf(bar),
    barAt: (index) => {
      const child = content.children.item(index);
      return child instanceof HTMLElement ? child : null;
    },
    size: () => content.children.length,
    isInvalid: (bar) => bar.classList.contains(STYLE_INVALID),
  };
}
