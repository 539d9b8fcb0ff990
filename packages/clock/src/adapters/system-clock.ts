import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

export type SystemClockOptions = {
  /**
   * Unref sleep timers so a pending sleep never keeps the process alive.
   *
   * @default true
   */
  unrefTimers?: boolean
}

export class SystemClock implements Clock {
  private readonly unrefTimers: boolean

  constructor(options: SystemClockOptions = {}) {
    this.unrefTimers = options.unrefTimers ?? true
  }

  now(): Date {
    return new Date()
  }

  nowMs(): UnixMs {
    return Date.now()
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const finish = () => {
        clearTimeout(timer)
        signal?.removeEventListener("abort", finish)
        resolve()
      }

      const timer = setTimeout(finish, ms)
      if (this.unrefTimers) timer.unref()

      signal?.addEventListener("abort", finish, { once: true })
    })
  }
}
