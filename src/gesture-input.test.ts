import { describe, expect, it, vi } from 'vitest';
import {
  createMouseGestureHandlers,
  createPointerGestureHandlers,
  createTouchGestureHandlers,
  readGesturePoint,
  type GestureSink,
  type NormalizedGesture,
} from './gesture-input';
import { createFakeScheduler } from './testing/fake-scheduler';

const BAR_TARGET = { id: 'bar' } as unknown as EventTarget;

function createSink(handled = true) {
  return {
    begin: vi.fn((_gesture: NormalizedGesture) => handled),
    move: vi.fn((_gesture: NormalizedGesture) => handled),
    end: vi.fn((_gesture: NormalizedGesture) => handled),
    cancel: vi.fn((_gesture: NormalizedGesture) => handled),
  } satisfies GestureSink;
}

function createMouseEvent(options: { button?: number; clientX?: number; clientY?: number; pointerId?: number } = {}) {
  return {
    button: 0,
    clientX: 0,
    clientY: 0,
    target: BAR_TARGET,
    stopPropagation: vi.fn(),
    preventDefault: vi.fn(),
    ...options,
  };
}

function createTouchEvent(options: {
  touches?: number;
  targetTouches?: number;
  changedTouches?: Array<{ clientX: number; clientY: number }>;
}) {
  const changed = options.changedTouches ?? [{ clientX: 0, clientY: 0 }];
  return {
    target: BAR_TARGET,
    touches: { length: options.touches ?? 1 },
    targetTouches: { length: options.targetTouches ?? 1 },
    changedTouches: {
      length: changed.length,
      item: (index: number) => changed[index] ?? null,
    },
    stopPropagation: vi.fn(),
    preventDefault: vi.fn(),
  };
}

describe('readGesturePoint', () => {
  it('reads client coordinates of mouse events', () => {
    const event = createMouseEvent({ clientX: 120, clientY: 40 }) as unknown as MouseEvent;
    expect(readGesturePoint(event)).toEqual({ x: 120, y: 40 });
  });

  it('reads the first changed touch of touch events', () => {
    const event = createTouchEvent({
      changedTouches: [
        { clientX: 33, clientY: 44 },
        { clientX: 99, clientY: 99 },
      ],
    }) as unknown as TouchEvent;
    expect(readGesturePoint(event)).toEqual({ x: 33, y: 44 });
  });

  it('returns null when a touch event carries no changed touches', () => {
    const event = createTouchEvent({ changedTouches: [] }) as unknown as TouchEvent;
    expect(readGesturePoint(event)).toBeNull();
  });
});

describe('createMouseGestureHandlers', () => {
  it('maps primary button events to begin, move and end', () => {
    const sink = createSink();
    const handlers = createMouseGestureHandlers(sink);

    handlers.mousedown(createMouseEvent({ clientX: 10, clientY: 2 }) as unknown as MouseEvent);
    handlers.mousemove(createMouseEvent({ clientX: 15, clientY: 2 }) as unknown as MouseEvent);
    handlers.mouseup(createMouseEvent({ clientX: 15, clientY: 2 }) as unknown as MouseEvent);

    expect(sink.begin).toHaveBeenCalledWith({ point: { x: 10, y: 2 }, target: BAR_TARGET });
    expect(sink.move).toHaveBeenCalledWith({ point: { x: 15, y: 2 }, target: BAR_TARGET });
    expect(sink.end).toHaveBeenCalledWith({ point: { x: 15, y: 2 }, target: BAR_TARGET });
  });

  it('tracks the press until the primary button is released', () => {
    const handlers = createMouseGestureHandlers(createSink());

    handlers.mousedown(createMouseEvent() as unknown as MouseEvent);
    expect(handlers.isTracking()).toBe(true);
    handlers.mouseup(createMouseEvent({ button: 2 }) as unknown as MouseEvent);
    expect(handlers.isTracking()).toBe(true);
    handlers.mouseup(createMouseEvent() as unknown as MouseEvent);
    expect(handlers.isTracking()).toBe(false);
  });

  it('does not track a press the sink declined', () => {
    const handlers = createMouseGestureHandlers(createSink(false));

    handlers.mousedown(createMouseEvent() as unknown as MouseEvent);

    expect(handlers.isTracking()).toBe(false);
  });

  it('ignores secondary buttons', () => {
    const sink = createSink();
    const handlers = createMouseGestureHandlers(sink);

    handlers.mousedown(createMouseEvent({ button: 2 }) as unknown as MouseEvent);
    handlers.mouseup(createMouseEvent({ button: 2 }) as unknown as MouseEvent);

    expect(sink.begin).not.toHaveBeenCalled();
    expect(sink.end).not.toHaveBeenCalled();
  });

  it('stops propagation only for consumed gestures', () => {
    const consumed = createMouseEvent();
    const ignored = createMouseEvent();

    createMouseGestureHandlers(createSink(true)).mousemove(consumed as unknown as MouseEvent);
    createMouseGestureHandlers(createSink(false)).mousemove(ignored as unknown as MouseEvent);

    expect(consumed.stopPropagation).toHaveBeenCalledTimes(1);
    expect(ignored.stopPropagation).not.toHaveBeenCalled();
  });
});

describe('createTouchGestureHandlers', () => {
  it('begins only for a single active touch and prevents the platform default', () => {
    const sink = createSink();
    const handlers = createTouchGestureHandlers(sink);
    const single = createTouchEvent({ targetTouches: 1, changedTouches: [{ clientX: 5, clientY: 6 }] });
    const multi = createTouchEvent({ touches: 2, targetTouches: 2 });

    handlers.touchstart(multi as unknown as TouchEvent);
    handlers.touchstart(single as unknown as TouchEvent);

    expect(sink.begin).toHaveBeenCalledTimes(1);
    expect(sink.begin).toHaveBeenCalledWith({ point: { x: 5, y: 6 }, target: BAR_TARGET });
    expect(single.preventDefault).toHaveBeenCalledTimes(1);
    expect(multi.preventDefault).not.toHaveBeenCalled();
  });

  it('rejects a second finger landing on another element', () => {
    const sink = createSink();
    const handlers = createTouchGestureHandlers(sink);
    const secondFinger = createTouchEvent({ touches: 2, targetTouches: 1 });

    handlers.touchstart(createTouchEvent({ touches: 1 }) as unknown as TouchEvent);
    handlers.touchstart(secondFinger as unknown as TouchEvent);

    expect(sink.begin).toHaveBeenCalledTimes(1);
    expect(secondFinger.preventDefault).not.toHaveBeenCalled();
  });

  it('moves only when exactly one touch changed', () => {
    const sink = createSink();
    const handlers = createTouchGestureHandlers(sink);

    handlers.touchmove(
      createTouchEvent({
        changedTouches: [
          { clientX: 1, clientY: 1 },
          { clientX: 2, clientY: 2 },
        ],
      }) as unknown as TouchEvent
    );
    handlers.touchmove(createTouchEvent({ changedTouches: [{ clientX: 7, clientY: 8 }] }) as unknown as TouchEvent);

    expect(sink.move).toHaveBeenCalledTimes(1);
    expect(sink.move).toHaveBeenCalledWith({ point: { x: 7, y: 8 }, target: BAR_TARGET });
  });

  it('maps touchend and touchcancel', () => {
    const sink = createSink();
    const handlers = createTouchGestureHandlers(sink);

    handlers.touchend(createTouchEvent({}) as unknown as TouchEvent);
    handlers.touchcancel(createTouchEvent({}) as unknown as TouchEvent);

    expect(sink.end).toHaveBeenCalledTimes(1);
    expect(sink.cancel).toHaveBeenCalledTimes(1);
  });
});

describe('createPointerGestureHandlers', () => {
  function setup() {
    const sink = createSink();
    const scheduler = createFakeScheduler();
    const onError = vi.fn();
    const handlers = createPointerGestureHandlers(sink, {
      detectionIntervalMs: 100,
      timers: scheduler,
      onError,
    });
    return { sink, scheduler, onError, handlers };
  }

  it('dispatches begin after the detection interval', () => {
    const { sink, scheduler, handlers } = setup();

    handlers.pointerdown(createMouseEvent({ pointerId: 1, clientX: 40, clientY: 3 }) as unknown as PointerEvent);

    expect(sink.begin).not.toHaveBeenCalled();
    expect(scheduler.delays.get(1)).toBe(100);
    expect(handlers.getActivePointerId()).toBe(1);

    scheduler.run(1);

    expect(sink.begin).toHaveBeenCalledWith({ point: { x: 40, y: 3 }, target: BAR_TARGET });
  });

  it('rejects a second pointer while one is tracked', () => {
    const { sink, scheduler, handlers } = setup();
    const second = createMouseEvent({ pointerId: 2 });

    handlers.pointerdown(createMouseEvent({ pointerId: 1 }) as unknown as PointerEvent);
    handlers.pointerdown(second as unknown as PointerEvent);
    handlers.pointermove(createMouseEvent({ pointerId: 2, clientX: 90 }) as unknown as PointerEvent);
    handlers.pointerup(createMouseEvent({ pointerId: 2 }) as unknown as PointerEvent);

    expect(second.preventDefault).toHaveBeenCalledTimes(1);
    expect(scheduler.pendingIds).toEqual([1]);
    expect(handlers.getActivePointerId()).toBe(1);
    expect(sink.move).not.toHaveBeenCalled();
    expect(sink.end).not.toHaveBeenCalled();
  });

  it('clears the pending begin and pointer id on end', () => {
    const { sink, scheduler, handlers } = setup();

    handlers.pointerdown(createMouseEvent({ pointerId: 1 }) as unknown as PointerEvent);
    handlers.pointerup(createMouseEvent({ pointerId: 1 }) as unknown as PointerEvent);
    scheduler.run(1);

    expect(scheduler.clearedIds).toEqual([1]);
    expect(sink.begin).not.toHaveBeenCalled();
    expect(sink.end).toHaveBeenCalledTimes(1);
    expect(handlers.getActivePointerId()).toBeNull();
  });

  it('clears the pointer id on cancel and accepts a new pointer afterwards', () => {
    const { sink, scheduler, handlers } = setup();

    handlers.pointerdown(createMouseEvent({ pointerId: 1 }) as unknown as PointerEvent);
    scheduler.run(1);
    handlers.pointercancel(createMouseEvent({ pointerId: 1 }) as unknown as PointerEvent);
    handlers.pointerdown(createMouseEvent({ pointerId: 5 }) as unknown as PointerEvent);

    expect(sink.cancel).toHaveBeenCalledTimes(1);
    expect(handlers.getActivePointerId()).toBe(5);
  });

  it('forwards hover moves while no pointer is tracked', () => {
    const { sink, handlers } = setup();

    handlers.pointermove(createMouseEvent({ pointerId: 3, clientX: 12 }) as unknown as PointerEvent);

    expect(sink.move).toHaveBeenCalledWith({ point: { x: 12, y: 0 }, target: BAR_TARGET });
  });

  it('reports begin dispatch errors through onError', () => {
    const { sink, scheduler, onError, handlers } = setup();
    const error = new Error('begin failed');
    sink.begin.mockImplementation(() => {
      throw error;
    });

    handlers.pointerdown(createMouseEvent({ pointerId: 1 }) as unknown as PointerEvent);
    scheduler.run(1);

    expect(onError).toHaveBeenCalledWith('pointer gesture begin', error);
  });
});
