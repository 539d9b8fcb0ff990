export type Release = () => void

/**
 * Counting semaphore for async tasks.
 *
 * Waiters are served in arrival order. A release handle only counts once, so
 * calling it from both a `finally` and an error path is harmless.
 */
export class Semaphore {
  private permits: number
  private readonly waiters: Array<(release: Release) => void> = []

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`)
    }

    this.permits = limit
  }

  get available(): number {
    return this.permits
  }

  get waiting(): number {
    return this.waiters.length
  }

  /** Resolves with a release handle, or `null` when `signal` aborts first. */
  acquire(signal?: AbortSignal): Promise<Release | null> {
    if (signal?.aborted) return Promise.resolve(null)

    if (this.permits > 0) {
      this.permits--
      return Promise.resolve(this.createRelease())
    }

    return new Promise((resolve) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(grant)
        if (index !== -1) this.waiters.splice(index, 1)
        resolve(null)
      }

      const grant = (release: Release) => {
        signal?.removeEventListener("abort", onAbort)
        resolve(release)
      }

      signal?.addEventListener("abort", onAbort, { once: true })
      this.waiters.push(grant)
    })
  }

  private createRelease(): Release {
    let released = false

    return () => {
      if (released) return
      released = true

      const next = this.waiters.shift()
      if (next) {
        next(this.createRelease())
      } else {
        this.permits++
      }
    }
  }
}
