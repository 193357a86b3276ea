export function invariant(
  condition: unknown,
  message?: string,
): asserts condition {
  if (!condition) {
    throw new Error(
      message != null ? message : 'Unexpected invariant triggered.',
    );
  }
}
