import type { Clock, Milliseconds } from "@murmur/clock"
import type { Logger } from "@murmur/logger"

export type JobRunnerDeps = {
  clock: Clock
  logger: Logger
}

/** A job body. It must stop promptly once `signal` aborts. */
export type JobTask = (signal: AbortSignal) => Promise<void>

export type DrainResult = {
  /** Jobs that finished within the grace period. */
  completed: number
  /** Jobs whose signal had to be aborted. */
  cancelled: number
}

type RunningJob = {
  name: string
  controller: AbortController
  done: Promise<void>
}

/**
 * Registry of background jobs.
 *
 * Jobs run detached from their caller. Once `stopAccepting()` is called new
 * jobs are refused; `drain()` then waits for the running ones and aborts
 * whatever is left when the grace period ends.
 */
export class JobRunner {
  private readonly jobs = new Map<number, RunningJob>()
  private readonly logger: Logger
  private nextId = 0
  private accepting = true

  constructor(private readonly deps: JobRunnerDeps) {
    this.logger = deps.logger.child({ module: "job-runner" })
  }

  get isAccepting(): boolean {
    return this.accepting
  }

  get size(): number {
    return this.jobs.size
  }

  /** Starts `task` in the background. Returns `false` when the runner no longer accepts jobs. */
  spawn(name: string, task: JobTask): boolean {
    if (!this.accepting) {
      this.logger.debug("Job refused, shutting down", { job: name })
      return false
    }

    const id = this.nextId++
    const controller = new AbortController()
    const done = this.execute(name, task, controller.signal).finally(() => {
      this.jobs.delete(id)
    })

    this.jobs.set(id, { name, controller, done })
    this.logger.debug("Job started", { job: name, running: this.jobs.size })

    return true
  }

  /** Names of running jobs, sorted. */
  list(): string[] {
    return [...this.jobs.values()].map((job) => job.name).sort()
  }

  stopAccepting(): void {
    this.accepting = false
  }

  /**
   * Refuses new jobs and waits up to `graceMs` for running ones. Jobs still
   * running after that are aborted and awaited.
   */
  async drain(graceMs: Milliseconds): Promise<DrainResult> {
    this.stopAccepting()

    const running = [...this.jobs.values()]
    if (running.length === 0) return { completed: 0, cancelled: 0 }

    this.logger.info("Waiting for running jobs", { running: running.length, graceMs })

    const timer = new AbortController()
    await Promise.race([
      Promise.all(running.map((job) => job.done)).finally(() => timer.abort()),
      this.deps.clock.sleep(graceMs, timer.signal),
    ])
    timer.abort()

    const leftover = [...this.jobs.values()]
    for (const job of leftover) job.controller.abort()
    if (leftover.length > 0) {
      this.logger.warn("Grace period over, cancelling jobs", { jobs: leftover.map((job) => job.name) })
      await Promise.all(leftover.map((job) => job.done))
    }

    return { completed: running.length - leftover.length, cancelled: leftover.length }
  }

  private async execute(name: string, task: JobTask, signal: AbortSignal): Promise<void> {
    try {
      await task(signal)
      this.logger.debug("Job finished", { job: name })
    } catch (err) {
      this.logger.error("Job crashed", { job: name, err })
    }
  }
}
