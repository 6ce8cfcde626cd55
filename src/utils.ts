import * as rxjs from "rxjs"

export function immediate<T>(func: () => T) {
  return func()
}

export function makeExposedPromise<T>() {
  const exposed = {} as {
    promise: Promise<T>
    fulfill(value: T): void
    reject(reason: unknown): void
  }
  exposed.promise = new Promise((fulfill, reject) => {
    exposed.fulfill = fulfill
    exposed.reject = reject
  })
  return exposed
}

/**
 * Runs submitted tasks one at a time, in submission order.
 * A failing task rejects its own promise and does not stall the queue.
 */
export function makeSerialExecutor() {
  const queue = new rxjs.Subject<() => Promise<void>>()
  queue
    .pipe(
      rxjs.concatMap(task => task())
    )
    .subscribe()

  return {
    run<T>(task: () => Promise<T>): Promise<T> {
      const exposed = makeExposedPromise<T>()
      queue.next(() => task().then(exposed.fulfill, exposed.reject))
      return exposed.promise
    }
  }
}

export function toDecibels(amplitude: number): string {
  return (20 * Math.log10(amplitude)).toFixed(1) + "dB"
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
