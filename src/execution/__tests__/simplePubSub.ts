/**
 * Create an AsyncIterator from an EventEmitter. Useful for mocking a
 * PubSub system for tests.
 */
export class SimplePubSub<T> {
  private _subscribers: Set<(value: T) => void>;

  constructor() {
    this._subscribers = new Set();
  }

  emit(event: T): boolean {
    for (const subscriber of this._subscribers) {
      subscriber(event);
    }
    return this._subscribers.size > 0;
  }

  getSubscriber<R>(transform: (value: T) => R): AsyncGenerator<R, void, void> {
    const pullQueue: Array<(result: IteratorResult<R, void>) => void> = [];
    const pushQueue: Array<IteratorYieldResult<R>> = [];
    const done: IteratorReturnResult<void> = { value: undefined, done: true };
    let listening = true;

    const pushValue = (event: T): void => {
      const result: IteratorYieldResult<R> = {
        value: transform(event),
        done: false,
      };
      const resolve = pullQueue.shift();
      if (resolve) {
        resolve(result);
      } else {
        pushQueue.push(result);
      }
    };

    const emptyQueue = (): void => {
      listening = false;
      this._subscribers.delete(pushValue);
      for (const resolve of pullQueue) {
        resolve(done);
      }
      pullQueue.length = 0;
      pushQueue.length = 0;
    };

    this._subscribers.add(pushValue);

    return {
      next(): Promise<IteratorResult<R, void>> {
        if (!listening) {
          return Promise.resolve(done);
        }

        const result = pushQueue.shift();
        if (result !== undefined) {
          return Promise.resolve(result);
        }
        return new Promise((resolve) => pullQueue.push(resolve));
      },
      return(): Promise<IteratorResult<R, void>> {
        emptyQueue();
        return Promise.resolve(done);
      },
      throw(error: unknown): Promise<IteratorResult<R, void>> {
        emptyQueue();
        return Promise.reject(error);
      },
      [Symbol.asyncIterator]() {
        return this;
      },
    };
  }
}
