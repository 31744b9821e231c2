/**
 * taskPool.ts
 *
 * Fixed-size pool for CPU-bound transforms (e.g. `select` over a large
 * payload). Callers only see execute(task, input). When every slot is busy,
 * submissions wait in FIFO order. A failure inside a task comes back as a
 * TaskExecutionError whose `cause` is the original error.
 *
 * Where the work actually runs is the TaskRunner's business; the default
 * runner executes tasks in-process on a later microtask, and a worker-thread
 * transport can be plugged in without touching callers.
 */

import { TaskExecutionError } from './errors'
import { silentLogger, type Logger } from './logger'
import { parseOrThrow, taskPoolConfigSchema } from './validation'

export type Task<TInput, TResult> = (input: TInput) => TResult | Promise<TResult>

export interface TaskRunner {
  run<TInput, TResult>(task: Task<TInput, TResult>, input: TInput): Promise<TResult>
}

/** Runs the task in this process, after the current synchronous work. */
export const inProcessRunner: TaskRunner = {
  async run<TInput, TResult>(task: Task<TInput, TResult>, input: TInput): Promise<TResult> {
    await Promise.resolve()
    return task(input)
  },
}

export interface TaskPoolConfig {
  /** Number of tasks that may run at once. Default 2. */
  size?: number
  runner?: TaskRunner
  logger?: Logger
}

export interface TaskPoolStatus {
  size: number
  busy: number
  idle: number
  queued: number
  disposed: boolean
}

interface PendingTask {
  start: () => void
  reject: (error: TaskExecutionError) => void
}

export class TaskPool {
  readonly size: number

  #runner: TaskRunner
  #logger: Logger
  #busy = 0
  #queue: PendingTask[] = []
  #disposed = false

  constructor(config: TaskPoolConfig = {}) {
    parseOrThrow(taskPoolConfigSchema, config, 'task pool config')
    this.size = config.size ?? 2
    this.#runner = config.runner ?? inProcessRunner
    this.#logger = config.logger ?? silentLogger
  }

  execute<TInput, TResult>(task: Task<TInput, TResult>, input: TInput): Promise<TResult> {
    if (this.#disposed) {
      return Promise.reject(new TaskExecutionError('Task pool has been disposed'))
    }

    return new Promise<TResult>((resolve, reject) => {
      const start = (): void => {
        void this.#run(task, input, resolve, reject)
      }
      if (this.#busy < this.size) {
        start()
      } else {
        this.#queue.push({ start, reject })
      }
    })
  }

  status(): TaskPoolStatus {
    return {
      size: this.size,
      busy: this.#busy,
      idle: this.size - this.#busy,
      queued: this.#queue.length,
      disposed: this.#disposed,
    }
  }

  /** Reject queued tasks and refuse new ones. Running tasks finish. */
  dispose(): void {
    if (this.#disposed) return
    this.#disposed = true
    const queued = this.#queue
    this.#queue = []
    queued.forEach((pending) => pending.reject(new TaskExecutionError('Task pool has been disposed')))
  }

  async #run<TInput, TResult>(
    task: Task<TInput, TResult>,
    input: TInput,
    resolve: (value: TResult) => void,
    reject: (error: TaskExecutionError) => void,
  ): Promise<void> {
    this.#busy++
    try {
      resolve(await this.#runner.run(task, input))
    } catch (error) {
      this.#logger.debug('[pool] task failed', { error })
      reject(new TaskExecutionError('Task execution failed', error))
    } finally {
      this.#busy--
      this.#queue.shift()?.start()
    }
  }
}
