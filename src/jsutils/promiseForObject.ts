import type { ObjMap } from './ObjMap';

/**
 * This function transforms a JS object `ObjMap<Promise<T>>` into
 * a `Promise<ObjMap<T>>`
 *
 * This is akin to bluebird's `Promise.props`.
 */
export async function promiseForObject<T>(
  object: ObjMap<Promise<T> | T>,
): Promise<ObjMap<Awaited<T>>> {
  const keys = Object.keys(object);
  const values = Object.values(object);

  const resolvedValues = await Promise.all(values);
  const resolvedObject: ObjMap<Awaited<T>> = Object.create(null);
  for (let i = 0; i < keys.length; ++i) {
    resolvedObject[keys[i]] = resolvedValues[i];
  }
  return resolvedObject;
}
