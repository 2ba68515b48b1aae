/**
 * Ordered fallback resolution. Each provider may yield a value; the first one
 * that does wins, otherwise the default is returned. A provider that throws
 * counts as yielding nothing.
 */
export type Provider<T> = () => T | undefined;

export type AsyncProvider<T> = () => Promise<T | undefined>;

export function resolveFirst<T>(providers: readonly Provider<T>[], fallback: T): T {
  for (const provider of providers) {
    let value: T | undefined;
    try {
      value = provider();
    } catch {
      value = undefined;
    }
    if (value !== undefined) {
      return value;
    }
  }
  return fallback;
}

export async function resolveFirstAsync<T>(
  providers: readonly AsyncProvider<T>[],
  fallback: T
): Promise<T> {
  for (const provider of providers) {
    const value = await provider().catch(() => undefined);
    if (value !== undefined) {
      return value;
    }
  }
  return fallback;
}
