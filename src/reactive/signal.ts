/**
 * @license
 * SPDX-License-Identifier: Apache-2.0
 */
export type SignalSubscriber<T> = (value: T) => void;

export interface Signal<T> {
  get: () => T;
  set: (value: T) => void;
  subscribe: (subscriber: SignalSubscriber<T>) => () => void;
}

/**
 * Holds a value and notifies subscribers on change. Subscribers receive the
 * current value immediately. `isEqual` decides what counts as a change.
 */
export function createSignal<T>(initialValue: T, isEqual: (a: T, b: T) => boolean = Object.is): Signal<T> {
  let value = initialValue;
  const subscribers = new Set<SignalSubscriber<T>>();

  return {
    get: () => value,
    set: (nextValue: T) => {
      if (isEqual(value, nextValue)) return;
      value = nextValue;
      Array.from(subscribers).forEach((subscriber) => subscriber(value));
    },
    subscribe: (subscriber: SignalSubscriber<T>) => {
      subscribers.add(subscriber);
      subscriber(value);
      return () => {
        subscribers.delete(subscriber);
      };
    },
  };
}
