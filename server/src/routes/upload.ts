import express, { NextFunction, Request, Response } from 'express'
import multer from 'multer'
import { v4 as uuidv4 } from 'uuid'
import { RequestWithId } from '../middleware/requestId'
import { JobSubmissionService } from '../services/jobSubmission'
import { withRequestId } from '../lib/logger'
import { sanitizeFilename } from '../utils/sanitizeFilename'
import {
  MISSING_FILE_MESSAGE,
  PART_RANGE_MESSAGE,
  parsePartCount,
  validateVideoFile,
} from '../utils/fileValidation'
import { discardUpload } from '../utils/fileCleanup'

export interface UploadRouterDeps {
  submission: JobSubmissionService
  uploadsRoot: string
  maxUploadBytes: number
}

export function createUploadRouter(deps: UploadRouterDeps): express.Router {
  const router = express.Router()

  // Multer writes into the uploads root; the submission moves the file into its job's directory.
  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      cb(null, deps.uploadsRoot)
    },
    filename: (_req, file, cb) => {
      cb(null, `${uuidv4()}-${sanitizeFilename(file.originalname)}`)
    },
  })

  const upload = multer({
    storage,
    limits: { fileSize: deps.maxUploadBytes, files: 1 },
  })

  router.post('/', upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
    const requestId = (req as RequestWithId).requestId
    const log = withRequestId(requestId)
    const file = req.file
    const rawParts: unknown = req.body?.parts
    log.info({ filename: file?.originalname, parts: rawParts }, 'Received upload request')

    try {
      if (!file || !file.originalname) {
        await discardUpload(file?.path, log)
        return res.status(400).json({ message: MISSING_FILE_MESSAGE })
      }

      const parts = parsePartCount(rawParts)
      if (parts === null) {
        await discardUpload(file.path, log)
        return res.status(400).json({ message: PART_RANGE_MESSAGE })
      }

      const fileError = await validateVideoFile(file.path, file.originalname)
      if (fileError) {
        await discardUpload(file.path, log)
        return res.status(400).json({ message: fileError })
      }

      const { jobId, record } = await deps.submission.submit({
        uploadedPath: file.path,
        originalFilename: file.originalname,
        parts,
        requestId,
      })

      return res.status(202).json({
        jobId,
        status: record.status,
        statusUrl: `/api/jobs/${jobId}`,
      })
    } catch (err) {
      await discardUpload(file?.path, log)
      next(err)
    }
  })

  return router
}
