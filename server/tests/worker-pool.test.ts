import assert from 'node:assert/strict'
import test from 'node:test'
import { PoolClosedError } from '../src/lib/errors'
import { WorkerPool } from '../src/workers/workerPool'
import { deferred, Deferred } from './helpers/temp-data'

const flush = () => new Promise<void>((resolve) => setImmediate(resolve))

test('runs at most `concurrency` tasks and starts them in submission order', async () => {
  const pool = new WorkerPool({ concurrency: 2, name: 'test-pool' })
  const gates: Deferred<void>[] = []
  const started: number[] = []
  const finished: number[] = []
  let running = 0
  let maxRunning = 0

  for (let i = 0; i < 5; i++) {
    const gate = deferred<void>()
    gates.push(gate)
    pool.submit(async () => {
      started.push(i)
      running += 1
      maxRunning = Math.max(maxRunning, running)
      await gate.promise
      running -= 1
      finished.push(i)
    })
  }

  assert.deepEqual(started, [0, 1])
  assert.deepEqual(pool.stats(), { name: 'test-pool', concurrency: 2, active: 2, waiting: 3, closed: false })

  gates[1].resolve()
  await flush()
  assert.deepEqual(started, [0, 1, 2])

  for (const gate of gates) gate.resolve()
  await pool.onIdle()

  assert.deepEqual(started, [0, 1, 2, 3, 4])
  assert.equal(finished[0], 1)
  assert.equal(finished.length, 5)
  assert.equal(maxRunning, 2)
  assert.deepEqual(pool.stats(), { name: 'test-pool', concurrency: 2, active: 0, waiting: 0, closed: false })
})

test('a failing task does not stop later tasks', async () => {
  const pool = new WorkerPool({ concurrency: 1 })
  let ranAfterFailure = false

  pool.submit(async () => {
    throw new Error('task blew up')
  })
  pool.submit(async () => {
    ranAfterFailure = true
  })

  await pool.onIdle()
  assert.equal(ranAfterFailure, true)
})

test('shutdown drops waiting tasks, lets running ones finish and rejects new work', async () => {
  const pool = new WorkerPool({ concurrency: 1, name: 'closing' })
  const blocker = deferred<void>()
  const ran: string[] = []

  pool.submit(async () => {
    await blocker.promise
    ran.push('running')
  })
  pool.submit(async () => {
    ran.push('waiting-1')
  })
  pool.submit(async () => {
    ran.push('waiting-2')
  })

  assert.equal(pool.shutdown(), 2)
  assert.equal(pool.shutdown(), 0)
  assert.deepEqual(pool.stats(), { name: 'closing', concurrency: 1, active: 1, waiting: 0, closed: true })
  assert.throws(() => pool.submit(async () => undefined), PoolClosedError)

  blocker.resolve()
  await pool.onIdle()
  assert.deepEqual(ran, ['running'])
})

test('concurrency below one is raised to one', () => {
  assert.equal(new WorkerPool({ concurrency: 0 }).concurrency, 1)
  assert.equal(new WorkerPool({ concurrency: Number.NaN }).concurrency, 1)
  assert.equal(new WorkerPool({ concurrency: 3.7 }).concurrency, 3)
})
