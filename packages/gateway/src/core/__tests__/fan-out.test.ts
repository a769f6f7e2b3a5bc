import { allOrNothing } from "../fan-out"

function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    signal.addEventListener("abort", () => reject(new Error("cancelled")), { once: true })
  })
}

describe("allOrNothing", () => {
  it("keeps input order whatever the completion order", async () => {
    const gates = [deferred<string>(), deferred<string>(), deferred<string>()]

    const pending = allOrNothing([0, 1, 2], undefined, async (i) => {
      const gate = gates[i]
      if (!gate) throw new Error(`no gate ${i}`)
      return gate.promise
    })

    gates[2]?.resolve("c")
    gates[0]?.resolve("a")
    gates[1]?.resolve("b")

    expect(await pending).toEqual(["a", "b", "c"])
  })

  it("returns an empty array for no items", async () => {
    expect(await allOrNothing([], undefined, async () => 1)).toEqual([])
  })

  it("aborts siblings on the first failure and waits for them before rejecting", async () => {
    const failure = new Error("third failed")
    const finished: number[] = []

    const error = await allOrNothing([1, 2, 3, 4, 5], undefined, async (item, signal) => {
      try {
        if (item === 3) throw failure
        return await untilAborted(signal)
      } finally {
        finished.push(item)
      }
    }).catch((e) => e)

    expect(error).toBe(failure)
    expect([...finished].sort()).toEqual([1, 2, 3, 4, 5])
  })

  it("passes the first failure as the abort reason", async () => {
    const failure = new Error("first")
    let reason: unknown

    await allOrNothing(["bad", "slow"], undefined, async (item, signal) => {
      if (item === "bad") throw failure
      await untilAborted(signal).catch(() => {
        reason = signal.reason
      })
      return item
    }).catch(() => undefined)

    expect(reason).toBe(failure)
  })

  it("follows the caller signal", async () => {
    const controller = new AbortController()
    const pending = allOrNothing([1, 2], controller.signal, (_item, signal) => untilAborted(signal))

    controller.abort()

    await expect(pending).rejects.toThrow("cancelled")
  })

  it("starts with an aborted scope when the caller signal is already aborted", async () => {
    const controller = new AbortController()
    controller.abort()
    const seen: boolean[] = []

    await allOrNothing([1], controller.signal, async (_item, signal) => {
      seen.push(signal.aborted)
    })

    expect(seen).toEqual([true])
  })
})
