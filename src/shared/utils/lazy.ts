/**
 * Builds a value on first use and reuses it across warm invocations.
 * A failed build is forgotten so the next invocation tries again.
 */
export function lazyAsync<T>(factory: () => Promise<T>): () => Promise<T> {
  let pending: Promise<T> | undefined

  return () => {
    if (!pending) {
      pending = factory().catch((error: unknown) => {
        pending = undefined
        throw error
      })
    }
    return pending
  }
}
