/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
import type { TimelineCoordinates } from './types';
import type { BarPercentGeometry } from './step-drag-state';

export interface TimeRange {
  startTime: number;
  endTime: number;
}

/** Both edges are absolute positions from the track origin. */
export function pixelToTimeRange(timeline: TimelineCoordinates, leftPx: number, widthPx: number): TimeRange {
  return {
    startTime: timeline.pixelPositionToTime(leftPx),
    endTime: timeline.pixelPositionToTime(leftPx + widthPx),
  };
}

export function timeRangeToPercentagePosition(
  timeline: TimelineCoordinates,
  startTime: number,
  endTime: number
): BarPercentGeometry {
  return {
    left: timeline.percentageLeftForTime(startTime),
    width: timeline.percentageWidthForTimeSpan(endTime - startTime),
  };
}

export function isValidStepRange(startTime: number, endTime: number) {
  if (!Number.isFinite(startTime) || !Number.isFinite(endTime)) return false;
  return startTime >= 0 && endTime >= 0 && endTime > startTime;
}
