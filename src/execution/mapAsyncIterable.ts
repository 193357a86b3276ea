import { Repeater } from '@repeaterjs/repeater';

import { isPromise } from '../jsutils/isPromise';
import type { PromiseOrValue } from '../jsutils/PromiseOrValue';

/**
 * Given an AsyncIterable and a callback function, return an AsyncGenerator
 * which produces values mapped via calling the callback function.
 *
 * Returning the generator returns the source, even while a call to the
 * source's `next()` is still pending. Errors thrown into the generator are
 * thrown into the source when it has a `throw()` method.
 */
export function mapAsyncIterable<T, U>(
  iterable: AsyncGenerator<T> | AsyncIterable<T>,
  fn: (value: T) => PromiseOrValue<U>,
): AsyncGenerator<U, void, void> {
  return new Repeater<U, void, void>(async (push, stop) => {
    const iter: AsyncIterator<T> = iterable[Symbol.asyncIterator]();
    let finalIteration: PromiseOrValue<unknown>;

    // eslint-disable-next-line @typescript-eslint/no-floating-promises
    stop.then(() => {
      finalIteration = typeof iter.return === 'function' ? iter.return() : true;
    });

    let thrown = false;
    let thrownError: unknown;
    // eslint-disable-next-line no-unmodified-loop-condition
    while (!finalIteration) {
      // the source is raced against stop so that a pending next() does not
      // hold up an early return
      let eventStream: Repeater<IteratorResult<T> | undefined>;
      if (thrown) {
        if (typeof iter.throw !== 'function') {
          throw thrownError;
        }
        thrown = false;
        eventStream = Repeater.race([iter.throw(thrownError), stop]);
      } else {
        eventStream = Repeater.race([iter.next(), stop]);
      }

      // eslint-disable-next-line no-await-in-loop
      const possibleIteration = (await eventStream.next()).value;

      if (possibleIteration === undefined) {
        break;
      }

      if (possibleIteration.done) {
        stop();
        break;
      }

      const mapped = fn(possibleIteration.value);
      try {
        // eslint-disable-next-line no-await-in-loop
        await push(mapped);
      } catch (error) {
        thrown = true;
        thrownError = error;
      }
    }

    if (isPromise(finalIteration)) {
      await finalIteration;
    }
  });
}
