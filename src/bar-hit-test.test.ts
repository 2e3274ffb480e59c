// @vitest-environment jsdom
import { describe, expect, it } from 'vitest';
import { classifyBarZone, isResizeZone, locateBar, resolveStepDragMode } from './bar-hit-test';

const RESIZABLE = { resizable: true, handleWidthPx: 10 };

describe('classifyBarZone', () => {
  const bounds = { left: 100, right: 200 };

  it('classifies the left margin as resize-left', () => {
    expect(classifyBarZone(bounds, 100, RESIZABLE)).toBe('resize-left');
    expect(classifyBarZone(bounds, 110, RESIZABLE)).toBe('resize-left');
  });

  it('classifies the right margin as resize-right', () => {
    expect(classifyBarZone(bounds, 190, RESIZABLE)).toBe('resize-right');
    expect(classifyBarZone(bounds, 200, RESIZABLE)).toBe('resize-right');
  });

  it('falls through to move between the margins', () => {
    expect(classifyBarZone(bounds, 111, RESIZABLE)).toBe('move');
    expect(classifyBarZone(bounds, 189, RESIZABLE)).toBe('move');
  });

  it('treats every position of a narrow bar as a resize zone', () => {
    const narrow = { left: 100, right: 115 };
    for (let x = 100; x <= 115; x++) {
      expect(isResizeZone(classifyBarZone(narrow, x, RESIZABLE))).toBe(true);
    }
    expect(classifyBarZone(narrow, 110, RESIZABLE)).toBe('resize-left');
    expect(classifyBarZone(narrow, 111, RESIZABLE)).toBe('resize-right');
  });

  it('always reports move when resizing is not permitted', () => {
    expect(classifyBarZone(bounds, 100, { resizable: false, handleWidthPx: 10 })).toBe('move');
    expect(classifyBarZone(bounds, 200, { resizable: false, handleWidthPx: 10 })).toBe('move');
  });
});

describe('resolveStepDragMode', () => {
  const base = {
    bounds: { left: 0, right: 100 },
    x: 50,
    invalid: false,
    movable: true,
    resizable: true,
    handleWidthPx: 10,
  };

  it('never drags invalid bars', () => {
    expect(resolveStepDragMode({ ...base, invalid: true })).toBe('none');
    expect(resolveStepDragMode({ ...base, invalid: true, x: 2 })).toBe('none');
  });

  it('keeps resize zones when steps are not movable', () => {
    expect(resolveStepDragMode({ ...base, movable: false, x: 95 })).toBe('resize-right');
    expect(resolveStepDragMode({ ...base, movable: false })).toBe('none');
  });

  it('returns move for the bar body', () => {
    expect(resolveStepDragMode(base)).toBe('move');
  });
});

describe('locateBar', () => {
  function createContent() {
    const content = document.createElement('div');
    const bar = document.createElement('div');
    const label = document.createElement('div');
    const inner = document.createElement('span');
    label.appendChild(inner);
    bar.appendChild(label);
    content.appendChild(bar);
    return { content, bar, label, inner };
  }

  it('returns the bar for the bar itself and for its direct child', () => {
    const { content, bar, label } = createContent();
    expect(locateBar(bar, content)).toBe(bar);
    expect(locateBar(label, content)).toBe(bar);
  });

  it('stops after two levels', () => {
    const { content, inner } = createContent();
    expect(locateBar(inner, content)).toBeNull();
  });

  it('returns null for the content element and foreign targets', () => {
    const { content } = createContent();
    expect(locateBar(content, content)).toBeNull();
    expect(locateBar(document.createElement('div'), content)).toBeNull();
    expect(locateBar(null, content)).toBeNull();
  });
});
