/**
 * Health, version and ops/queue endpoints.
 */
import { Router, Request, Response } from 'express'
import { WorkerPool } from '../workers/workerPool'

export interface HealthRouterDeps {
  pool: WorkerPool
  release: string
  nodeEnv: string
}

export function createHealthRouter(deps: HealthRouterDeps): Router {
  const router = Router()

  /** GET /healthz: process up, no dependency check */
  router.get('/healthz', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok' })
  })

  /** GET /version: service, release, env */
  router.get('/version', (_req: Request, res: Response) => {
    res.json({
      service: 'api',
      release: deps.release,
      env: deps.nodeEnv,
    })
  })

  /** GET /ops/queue: worker pool capacity, running and waiting jobs */
  router.get('/ops/queue', (_req: Request, res: Response) => {
    res.json(deps.pool.stats())
  })

  return router
}
