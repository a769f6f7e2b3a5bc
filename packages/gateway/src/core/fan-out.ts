/**
 * Runs `task` for every item at once under a shared abort scope. The first
 * failure aborts the scope so the other tasks stop early; every task is still
 * awaited before that first failure is rethrown. Results keep input order.
 * Work the finished tasks already did is not undone.
 */
export async function allOrNothing<I, R>(
  items: readonly I[],
  signal: AbortSignal | undefined,
  task: (item: I, signal: AbortSignal) => Promise<R>,
): Promise<R[]> {
  const scope = new AbortController()
  const state: { failure?: { error: unknown } } = {}

  const onAbort = () => scope.abort(signal?.reason)
  if (signal?.aborted) onAbort()
  signal?.addEventListener("abort", onAbort, { once: true })

  try {
    const settled = await Promise.allSettled(
      items.map(async (item) => {
        try {
          return await task(item, scope.signal)
        } catch (error) {
          if (!state.failure) {
            state.failure = { error }
            scope.abort(error)
          }
          throw error
        }
      }),
    )

    if (state.failure) throw state.failure.error

    return settled.map((result) => {
      if (result.status === "rejected") throw result.reason
      return result.value
    })
  } finally {
    signal?.removeEventListener("abort", onAbort)
  }
}
