/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */

/** One schedulable item drawn as a bar. Times are epoch milliseconds. */
export interface StepData {
  startTime: number;
  endTime: number;
  caption: string;
  backgroundColor: string;
}

export type TimelineResolution = 'hour' | 'day' | 'week';

export interface TimelineRange {
  startTime: number;
  endTime: number;
  resolution: TimelineResolution;
  /** Weekday week cells start on, 0 = Sunday (UTC). Without it weeks run from `startTime`. */
  firstDayOfWeek?: number;
}

/** Receives step notifications. Indexes follow the iteration order of the rendered steps. */
export interface GanttRpc {
  stepClicked(index: number): void;
  onMove(index: number, startTime: number, endTime: number): void;
  onResize(index: number, startTime: number, endTime: number): void;
}

/** Pixel <-> time mapping owned by the timeline. Pixels are measured from the track origin. */
export interface TimelineCoordinates {
  pixelPositionToTime(pixel: number): number;
  percentageLeftForTime(time: number): string;
  percentageWidthForTimeSpan(duration: number): string;
}

export interface TimelineLayout {
  readonly element: HTMLElement;
  update(range: TimelineRange): void;
  getMinWidth(): number;
  isOverflowingHorizontally(): boolean;
  setScrollLeft(scrollLeft: number): void;
  updateWidths(): void;
}

export type GanttTimeline = TimelineCoordinates & TimelineLayout;

export interface GesturePoint {
  x: number;
  y: number;
}
