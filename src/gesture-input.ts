/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
import type { GesturePoint } from './types';
import type { GestureInputModel } from './gantt-settings';
import { createScheduledTask, type GestureTimers } from './scheduled-task';

export type GesturePhase = 'begin' | 'move' | 'end' | 'cancel';

export interface NormalizedGesture {
  point: GesturePoint;
  target: EventTarget | null;
}

/**
 * Receives the device-independent gesture stream. A handler returns true when it
 * consumed the gesture, which stops the originating event from propagating.
 */
export type GestureSink = Record<GesturePhase, (gesture: NormalizedGesture) => boolean>;

export interface GestureInputBinding {
  model: GestureInputModel;
  unbind: () => void;
}

export interface PointerGestureOptions {
  detectionIntervalMs: number;
  timers: GestureTimers;
  onError: (context: string, error: unknown) => void;
}

export function readGesturePoint(event: MouseEvent | TouchEvent): GesturePoint | null {
  if ('changedTouches' in event) {
    const touch = event.changedTouches.item(0);
    if (!touch) return null;
    return { x: touch.clientX, y: touch.clientY };
  }
  return { x: event.clientX, y: event.clientY };
}

function toGesture(event: MouseEvent | TouchEvent): NormalizedGesture | null {
  const point = readGesturePoint(event);
  if (!point) return null;
  return { point, target: event.target };
}

function dispatchGesture(sink: GestureSink, phase: GesturePhase, event: MouseEvent | TouchEvent) {
  const gesture = toGesture(event);
  if (!gesture) return false;
  const handled = sink[phase](gesture);
  if (handled) {
    event.stopPropagation();
  }
  return handled;
}

export function createMouseGestureHandlers(sink: GestureSink) {
  let tracking = false;

  return {
    mousedown(event: MouseEvent) {
      if (event.button !== 0 || tracking) return;
      tracking = dispatchGesture(sink, 'begin', event);
    },
    mousemove(event: MouseEvent) {
      dispatchGesture(sink, 'move', event);
    },
    mouseup(event: MouseEvent) {
      if (event.button !== 0) return;
      tracking = false;
      dispatchGesture(sink, 'end', event);
    },
    /** True between an accepted mousedown and the primary button release. */
    isTracking: () => tracking,
  };
}

export function createTouchGestureHandlers(sink: GestureSink) {
  return {
    touchstart(event: TouchEvent) {
      // multi-finger gestures are not supported, wherever the other fingers rest
      if (event.touches.length !== 1) return;
      event.preventDefault();
      dispatchGesture(sink, 'begin', event);
    },
    touchmove(event: TouchEvent) {
      if (event.changedTouches.length !== 1) return;
      if (dispatchGesture(sink, 'move', event)) {
        event.preventDefault();
      }
    },
    touchend(event: TouchEvent) {
      dispatchGesture(sink, 'end', event);
    },
    touchcancel(event: TouchEvent) {
      dispatchGesture(sink, 'cancel', event);
    },
  };
}

/**
 * Pointer events honor one pointer at a time. The normalized begin is delayed so
 * the platform can decide between touch and mouse handling before a capture starts.
 */
export function createPointerGestureHandlers(sink: GestureSink, options: PointerGestureOptions) {
  let currentPointerId: number | null = null;
  let pendingBegin: NormalizedGesture | null = null;

  const pendingBeginTask = createScheduledTask({
    getDelayMs: () => options.detectionIntervalMs,
    context: 'pointer gesture begin',
    onError: options.onError,
    timers: options.timers,
    callback: () => {
      const gesture = pendingBegin;
      pendingBegin = null;
      if (gesture) {
        sink.begin(gesture);
      }
    },
  });

  const releasePointer = () => {
    currentPointerId = null;
    pendingBeginTask.cancel();
    pendingBegin = null;
  };

  const isForeignPointer = (event: PointerEvent) =>
    currentPointerId !== null && event.pointerId !== currentPointerId;

  return {
    pointerdown(event: PointerEvent) {
      if (currentPointerId !== null) {
        event.preventDefault();
        return;
      }
      if (event.button !== 0) return;
      const gesture = toGesture(event);
      if (!gesture) return;
      currentPointerId = event.pointerId;
      pendingBegin = gesture;
      pendingBeginTask.schedule();
    },
    pointermove(event: PointerEvent) {
      if (isForeignPointer(event)) return;
      dispatchGesture(sink, 'move', event);
    },
    pointerup(event: PointerEvent) {
      if (isForeignPointer(event)) return;
      releasePointer();
      dispatchGesture(sink, 'end', event);
    },
    pointercancel(event: PointerEvent) {
      if (isForeignPointer(event)) return;
      releasePointer();
      dispatchGesture(sink, 'cancel', event);
    },
    getActivePointerId: () => currentPointerId,
    reset: releasePointer,
  };
}

function listen<K extends keyof HTMLElementEventMap>(
  element: HTMLElement,
  type: K,
  listener: (event: HTMLElementEventMap[K]) => void,
  options?: AddEventListenerOptions
) {
  element.addEventListener(type, listener, options);
  return () => element.removeEventListener(type, listener, options);
}

function listenDocument<K extends keyof DocumentEventMap>(
  ownerDocument: Document,
  type: K,
  listener: (event: DocumentEventMap[K]) => void
) {
  ownerDocument.addEventListener(type, listener, true);
  return () => ownerDocument.removeEventListener(type, listener, true);
}

/**
 * Document-level listeners that follow a live gesture, so a release outside the
 * chart still ends it.
 */
function createDocumentTracking(attach: () => Array<() => void>) {
  let disposers: Array<() => void> = [];
  return {
    start() {
      if (disposers.length > 0) return;
      disposers = attach();
    },
    stop() {
      disposers.splice(0).forEach((dispose) => dispose());
    },
  };
}

/** Wires exactly one input model to the element. */
export function bindGestureInput(
  element: HTMLElement,
  model: GestureInputModel,
  sink: GestureSink,
  pointerOptions: PointerGestureOptions
): GestureInputBinding {
  const ownerDocument = element.ownerDocument;
  const disposers: Array<() => void> = [];

  if (model === 'pointer') {
    const handlers = createPointerGestureHandlers(sink, pointerOptions);
    const isTracking = () => handlers.getActivePointerId() !== null;
    const untrackOnRelease = (handler: (event: PointerEvent) => void) => (event: PointerEvent) => {
      handler(event);
      if (!isTracking()) {
        tracking.stop();
      }
    };
    const tracking = createDocumentTracking(() => [
      listenDocument(ownerDocument, 'pointermove', handlers.pointermove),
      listenDocument(ownerDocument, 'pointerup', untrackOnRelease(handlers.pointerup)),
      listenDocument(ownerDocument, 'pointercancel', untrackOnRelease(handlers.pointercancel)),
    ]);
    disposers.push(
      listen(element, 'pointerdown', (event) => {
        handlers.pointerdown(event);
        if (isTracking()) {
          tracking.start();
        }
      }),
      // hover only; a tracked pointer is followed at document level
      listen(element, 'pointermove', (event) => {
        if (!isTracking()) {
          handlers.pointermove(event);
        }
      }),
      tracking.stop,
      handlers.reset
    );
  } else if (model === 'touch') {
    // touch events keep targeting the element the touch started on
    const handlers = createTouchGestureHandlers(sink);
    disposers.push(
      listen(element, 'touchstart', handlers.touchstart, { passive: false }),
      listen(element, 'touchmove', handlers.touchmove, { passive: false }),
      listen(element, 'touchend', handlers.touchend),
      listen(element, 'touchcancel', handlers.touchcancel)
    );
  } else {
    const handlers = createMouseGestureHandlers(sink);
    const tracking = createDocumentTracking(() => [
      listenDocument(ownerDocument, 'mousemove', handlers.mousemove),
      listenDocument(ownerDocument, 'mouseup', (event) => {
        handlers.mouseup(event);
        if (!handlers.isTracking()) {
          tracking.stop();
        }
      }),
    ]);
    disposers.push(
      listen(element, 'mousedown', (event) => {
        handlers.mousedown(event);
        if (handlers.isTracking()) {
          tracking.start();
        }
      }),
      listen(element, 'mousemove', (event) => {
        if (!handlers.isTracking()) {
          handlers.mousemove(event);
        }
      }),
      tracking.stop
    );
  }

  return {
    model,
    unbind: () => {
      disposers.splice(0).forEach((dispose) => dispose());
    },
  };
}
