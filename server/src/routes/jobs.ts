import express, { NextFunction, Request, Response } from 'express'
import { isJobId } from '../models/Job'
import { JobStatusReader, toStatusView } from '../services/jobStatus'
import { RequestWithId } from '../middleware/requestId'
import { withRequestId } from '../lib/logger'

const NO_STORE_HEADERS = {
  'Cache-Control': 'no-store, no-cache, must-revalidate, proxy-revalidate',
  Pragma: 'no-cache',
  Expires: '0',
}

export function createJobsRouter(reader: JobStatusReader): express.Router {
  const router = express.Router()

  /** Full payload: { job_id, status, metadata, files }. 404 { job_id, status: 'not-found' } for unknown jobs. */
  router.get('/:jobId', async (req: Request, res: Response, next: NextFunction) => {
    const { jobId } = req.params
    const log = withRequestId((req as RequestWithId).requestId)
    res.set(NO_STORE_HEADERS)
    if (!isJobId(jobId)) {
      return res.status(400).json({ message: 'Invalid job id' })
    }
    try {
      const result = await reader.query(jobId)
      if (result.kind === 'not_found') {
        log.warn({ jobId }, 'Status requested for missing job')
        return res.status(404).json({ job_id: jobId, status: 'not-found' })
      }
      log.debug(
        { jobId, status: result.payload.status, files: result.payload.files.length },
        'Returning job status'
      )
      return res.json(result.payload)
    } catch (err) {
      next(err)
    }
  })

  /** Compact view: { status, createdAt, completedAt?, outputs, errorMessage? } */
  router.get('/:jobId/status', async (req: Request, res: Response, next: NextFunction) => {
    const { jobId } = req.params
    res.set(NO_STORE_HEADERS)
    if (!isJobId(jobId)) {
      return res.status(400).json({ message: 'Invalid job id' })
    }
    try {
      const result = await reader.query(jobId)
      if (result.kind === 'not_found') {
        return res.status(404).json({ job_id: jobId, status: 'not-found' })
      }
      return res.json(toStatusView(result.payload))
    } catch (err) {
      next(err)
    }
  })

  return router
}
