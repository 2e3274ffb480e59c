/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
import type { GanttTimeline, TimelineCoordinates, TimelineRange, TimelineResolution } from './types';
import {
  DEFAULT_TIMELINE_LOCALE,
  STYLE_TIMELINE,
  STYLE_TIMELINE_CELL,
  TIMELINE_MIN_CELL_WIDTH_PX,
} from './constants';

const RESOLUTION_UNIT_MS: Record<TimelineResolution, number> = {
  hour: 60 * 60 * 1000,
  day: 24 * 60 * 60 * 1000,
  week: 7 * 24 * 60 * 60 * 1000,
};

const RESOLUTION_LABEL_FORMAT: Record<TimelineResolution, Intl.DateTimeFormatOptions> = {
  hour: { hour: '2-digit', minute: '2-digit', hourCycle: 'h23' },
  day: { month: 'short', day: 'numeric' },
  week: { month: 'short', day: 'numeric' },
};

export interface LinearTimelineOptions {
  getTrackWidth: () => number;
  locale?: string;
  timeZone?: string;
  ownerDocument?: Document;
}

export interface TimelineCell {
  time: number;
  widthPercent: number;
}

function formatPercentage(value: number) {
  return `${Math.round(value * 10000) / 10000}%`;
}

/** Linear pixel <-> time mapping over the current range. */
export function createLinearTimeScale(
  getRange: () => Pick<TimelineRange, 'startTime' | 'endTime'> | null,
  getTrackWidth: () => number
): TimelineCoordinates {
  const getSpan = () => {
    const range = getRange();
    if (!range || range.endTime <= range.startTime) return null;
    return { startTime: range.startTime, span: range.endTime - range.startTime };
  };

  return {
    pixelPositionToTime(pixel: number) {
      const scale = getSpan();
      if (!scale) return 0;
      const trackWidth = getTrackWidth();
      if (trackWidth <= 0) return scale.startTime;
      return scale.startTime + Math.round((pixel * scale.span) / trackWidth);
    },
    percentageLeftForTime(time: number) {
      const scale = getSpan();
      if (!scale) return '0%';
      return formatPercentage(((time - scale.startTime) * 100) / scale.span);
    },
    percentageWidthForTimeSpan(duration: number) {
      const scale = getSpan();
      if (!scale) return '0%';
      return formatPercentage((duration * 100) / scale.span);
    },
  };
}

function isWeekday(value: number | undefined): value is number {
  return value !== undefined && Number.isInteger(value) && value >= 0 && value <= 6;
}

/** Start of the next week that begins on `firstDayOfWeek`, at UTC midnight. */
export function nextWeekStart(time: number, firstDayOfWeek: number) {
  const dayMs = RESOLUTION_UNIT_MS.day;
  const dayStart = Math.floor(time / dayMs) * dayMs;
  const weekday = new Date(dayStart).getUTCDay();
  const daysUntil = (firstDayOfWeek - weekday + 7) % 7 || 7;
  return dayStart + daysUntil * dayMs;
}

export function buildTimelineCells(range: TimelineRange): TimelineCell[] {
  const span = range.endTime - range.startTime;
  if (span <= 0) return [];
  const unit = RESOLUTION_UNIT_MS[range.resolution];
  const firstDayOfWeek = range.firstDayOfWeek;
  const nextCellStart =
    range.resolution === 'week' && isWeekday(firstDayOfWeek)
      ? (time: number) => nextWeekStart(time, firstDayOfWeek)
      : (time: number) => time + unit;

  const cells: TimelineCell[] = [];
  for (let time = range.startTime; time < range.endTime; ) {
    const cellEnd = Math.min(nextCellStart(time), range.endTime);
    cells.push({
      time,
      widthPercent: ((cellEnd - time) * 100) / span,
    });
    time = cellEnd;
  }
  return cells;
}

export function createLinearTimeline(options: LinearTimelineOptions): GanttTimeline {
  const ownerDocument = options.ownerDocument ?? document;
  const element = ownerDocument.createElement('div');
  element.className = STYLE_TIMELINE;
  const row = ownerDocument.createElement('div');
  row.className = `${STYLE_TIMELINE}-row`;
  element.appendChild(row);

  let range: TimelineRange | null = null;
  let cellCount = 0;
  const scale = createLinearTimeScale(() => range, options.getTrackWidth);

  const getMinWidth = () => {
    if (!range) return 0;
    return cellCount * TIMELINE_MIN_CELL_WIDTH_PX[range.resolution];
  };

  const updateWidths = () => {
    row.style.minWidth = `${getMinWidth()}px`;
  };

  const update = (nextRange: TimelineRange) => {
    range = { ...nextRange };
    const formatter = new Intl.DateTimeFormat(options.locale ?? DEFAULT_TIMELINE_LOCALE, {
      ...RESOLUTION_LABEL_FORMAT[nextRange.resolution],
      timeZone: options.timeZone,
    });
    const cells = buildTimelineCells(nextRange);
    cellCount = cells.length;

    row.replaceChildren(
      ...cells.map((cell) => {
        const cellElement = ownerDocument.createElement('div');
        cellElement.className = STYLE_TIMELINE_CELL;
        cellElement.style.width = formatPercentage(cell.widthPercent);
        cellElement.dataset.time = String(cell.time);
        cellElement.textContent = formatter.format(new Date(cell.time));
        return cellElement;
      })
    );
    updateWidths();
  };

  return {
    ...scale,
    element,
    update,
    getMinWidth,
    isOverflowingHorizontally: () => getMinWidth() > element.clientWidth,
    setScrollLeft: (scrollLeft: number) => {
      element.scrollLeft = scrollLeft;
    },
    updateWidths,
  };
}
