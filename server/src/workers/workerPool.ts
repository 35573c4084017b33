import { PoolClosedError } from '../lib/errors'
import { getLogger, Logger } from '../lib/logger'

export type PoolTask = () => Promise<void>

export interface WorkerPoolOptions {
  concurrency: number
  name?: string
  logger?: Logger
}

export interface PoolStats {
  name: string
  concurrency: number
  active: number
  waiting: number
  closed: boolean
}

/**
 * Bounded in-process task executor. At most `concurrency` tasks run at once; the rest wait in
 * submission order. Owned by the process and passed to whoever submits work.
 */
export class WorkerPool {
  readonly name: string
  readonly concurrency: number
  private readonly log: Logger
  private readonly queue: PoolTask[] = []
  private active = 0
  private closed = false
  private idleWaiters: Array<() => void> = []

  constructor(options: WorkerPoolOptions) {
    this.name = options.name ?? 'worker-pool'
    this.concurrency = Math.max(1, Math.floor(options.concurrency) || 1)
    this.log = (options.logger ?? getLogger('worker')).child({ pool: this.name })
  }

  /** Queue a task and return immediately. Throws PoolClosedError after shutdown(). */
  submit(task: PoolTask): void {
    if (this.closed) {
      throw new PoolClosedError(this.name)
    }
    this.queue.push(task)
    this.log.debug({ waiting: this.queue.length, active: this.active }, 'Task queued')
    this.drain()
  }

  stats(): PoolStats {
    return {
      name: this.name,
      concurrency: this.concurrency,
      active: this.active,
      waiting: this.queue.length,
      closed: this.closed,
    }
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Resolves once no task is running or waiting. */
  onIdle(): Promise<void> {
    if (this.active === 0 && this.queue.length === 0) return Promise.resolve()
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve)
    })
  }

  /**
   * Stop accepting tasks and drop the ones still waiting. Running tasks are left to finish.
   * Returns how many waiting tasks were dropped.
   */
  shutdown(): number {
    if (this.closed) return 0
    this.closed = true
    const dropped = this.queue.splice(0, this.queue.length).length
    this.log.info({ dropped, active: this.active }, 'Worker pool shut down')
    this.notifyIdle()
    return dropped
  }

  private drain(): void {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const task = this.queue.shift()
      if (!task) break
      this.active += 1
      void this.execute(task)
    }
  }

  private async execute(task: PoolTask): Promise<void> {
    try {
      await task()
    } catch (err) {
      this.log.error({ err }, 'Pool task failed')
    } finally {
      this.active -= 1
      this.drain()
      this.notifyIdle()
    }
  }

  private notifyIdle(): void {
    if (this.active > 0 || this.queue.length > 0) return
    const waiters = this.idleWaiters
    this.idleWaiters = []
    for (const resolve of waiters) resolve()
  }
}
