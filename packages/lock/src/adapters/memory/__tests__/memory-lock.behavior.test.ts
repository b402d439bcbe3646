import { MemoryLock } from "../memory-lock"

describe("MemoryLock (behavior)", () => {
  it("grants waiters in arrival order", async () => {
    const lock = new MemoryLock()
    const order: number[] = []

    const first = await lock.acquire("k")

    const waiters = [1, 2, 3].map(async (n) => {
      const lease = await lock.acquire("k")
      order.push(n)
      await lease.release()
    })

    await first.release()
    await Promise.all(waiters)

    expect(order).toEqual([1, 2, 3])
    expect(lock.isLocked("k")).toBe(false)
  })

  it("hands off directly so a later caller cannot cut in", async () => {
    const lock = new MemoryLock()
    const order: string[] = []

    const first = await lock.acquire("k")
    const waiting = lock.acquire("k").then((lease) => {
      order.push("waiting")
      return lease
    })

    await first.release()
    expect(lock.isLocked("k")).toBe(true)

    const late = lock.acquire("k").then((lease) => {
      order.push("late")
      return lease
    })

    await (await waiting).release()
    await (await late).release()

    expect(order).toEqual(["waiting", "late"])
    expect(lock.isLocked("k")).toBe(false)
  })

  it("a stale lease cannot release the next holder", async () => {
    const lock = new MemoryLock()

    const first = await lock.acquire("k")
    const waiting = lock.acquire("k")

    await first.release()
    const second = await waiting

    await first.release()

    expect(second.held).toBe(true)
    expect(lock.isLocked("k")).toBe(true)

    await second.release()
  })
})
