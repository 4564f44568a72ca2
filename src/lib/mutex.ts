/**
 * Promise-chain mutex. Each call to runExclusive waits for every earlier
 * call to settle before running, so critical sections never overlap.
 */
export type Mutex = {
  runExclusive: <T>(task: () => Promise<T>) => Promise<T>
  isLocked: () => boolean
}

export function createMutex(): Mutex {
  let tail: Promise<unknown> = Promise.resolve()
  let pending = 0

  return {
    runExclusive: <T>(task: () => Promise<T>): Promise<T> => {
      pending += 1
      const run = tail.then(task)
      // The next waiter only needs to know this one settled, not how
      tail = run.then(
        () => undefined,
        () => undefined
      )
      return run.finally(() => {
        pending -= 1
      })
    },
    isLocked: () => pending > 0,
  }
}
