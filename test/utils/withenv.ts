/**
 * Run `fn` with some environment variables overridden, restoring the
 * previous values afterwards. An `undefined` value unsets the variable for
 * the duration of the call.
 */
export function withEnv<T>(
  env: Record<string, string | undefined>,
  fn: () => T,
): T {
  const previous: Record<string, string | undefined> = {};
  for (const key of Object.keys(env)) {
    previous[key] = process.env[key];
  }
  const apply = (values: Record<string, string | undefined>): void => {
    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  };
  try {
    apply(env);
    return fn();
  } finally {
    apply(previous);
  }
}
