import { isObjectLike } from './isObjectLike';
import type { PromiseOrValue } from './PromiseOrValue';

/**
 * Returns true if the value acts like a Promise, i.e. has a "then" function,
 * otherwise returns false.
 */
export function isPromise<T>(value: PromiseOrValue<T>): value is Promise<T> {
  return isObjectLike(value) && typeof value.then === 'function';
}
