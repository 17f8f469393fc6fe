import type { ChannelConfiguration } from "../configuration";

export type ChannelQueue<T> = {
  /** Resolves false when the item was dropped. */
  offer: (item: T) => Promise<boolean>;
  /** Waits at most `timeout` ms for an item. */
  take: (timeout: number) => Promise<T | undefined>;
  poll: () => T | undefined;
  close: () => void;
  readonly length: number;
  readonly dropped: number;
};

type Waiter<T> = { resolve: (value: T) => void; timer: NodeJS.Timeout };

type Producer<T> = { item: T; resolve: () => void; timer: NodeJS.Timeout };

export const createChannelQueue = <T>(
  { capacity, overflow }: Pick<ChannelConfiguration, "capacity" | "overflow">,
  publishTimeout: number,
) => {
  const items: T[] = [];
  const takers: Waiter<T | undefined>[] = [];
  const producers: Producer<T>[] = [];
  let dropped = 0;
  let closed = false;

  const wait = <V>(waiters: Waiter<V>[], ms: number, fallback: V) =>
    new Promise<V>(resolve => {
      const waiter: Waiter<V> = {
        resolve,
        timer: setTimeout(() => {
          const index = waiters.indexOf(waiter);
          if (index >= 0) waiters.splice(index, 1);
          resolve(fallback);
        }, ms),
      };
      waiters.push(waiter);
    });

  const wake = <V>(waiters: Waiter<V>[], value: V) => {
    const waiter = waiters.shift();
    if (!waiter) return false;
    clearTimeout(waiter.timer);
    waiter.resolve(value);
    return true;
  };

  const push = (item: T) => {
    if (!wake(takers, item)) items.push(item);
  };

  const offer = async (item: T) => {
    if (closed) return false;
    // blocked producers go first
    if (items.length < capacity && !producers.length) {
      push(item);
      return true;
    }

    switch (overflow) {
      case "drop-newest":
        dropped++;
        return false;
      case "drop-oldest":
        items.shift();
        dropped++;
        push(item);
        return true;
      case "block":
        return new Promise<boolean>(resolve => {
          const producer: Producer<T> = {
            item,
            resolve: () => resolve(true),
            timer: setTimeout(() => {
              producers.splice(producers.indexOf(producer), 1);
              console.warn("Queue still full, enqueueing past capacity", {
                capacity,
                length: items.length,
              });
              push(item);
              resolve(true);
            }, publishTimeout),
          };
          producers.push(producer);
        });
    }
  };

  /** Moves the longest-blocked producer's item into the freed slot. */
  const admit = () => {
    const producer = producers.shift();
    if (!producer) return;
    clearTimeout(producer.timer);
    push(producer.item);
    producer.resolve();
  };

  const poll = () => {
    if (!items.length) return undefined;
    const item = items.shift();
    admit();
    return item;
  };

  const take = async (timeout: number) => {
    if (items.length) return poll();
    if (closed) return undefined;
    return wait(takers, timeout, undefined);
  };

  const close = () => {
    closed = true;
    while (wake(takers, undefined));
    while (producers.length) admit();
  };

  return {
    offer,
    take,
    poll,
    close,
    get length() {
      return items.length;
    },
    get dropped() {
      return dropped;
    },
  } satisfies ChannelQueue<T>;
};
