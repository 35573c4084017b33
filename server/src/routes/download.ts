import express, { Request, Response } from 'express'
import path from 'path'
import fs from 'fs'
import { isJobId } from '../models/Job'
import { MetadataStore, METADATA_FILENAME } from '../store/metadataStore'
import { RequestWithId } from '../middleware/requestId'
import { withRequestId } from '../lib/logger'
import { isPathWithinDir } from '../utils/assertPathWithinDir'

export function createDownloadRouter(store: MetadataStore): express.Router {
  const router = express.Router()

  router.get('/:jobId/:filename', (req: Request, res: Response) => {
    const { jobId, filename } = req.params
    const log = withRequestId((req as RequestWithId).requestId)

    if (!isJobId(jobId) || path.basename(filename) !== filename || filename === METADATA_FILENAME) {
      return res.status(400).json({ message: 'Invalid download path' })
    }

    const jobDir = store.jobDir(jobId)
    const filePath = path.join(jobDir, filename)
    // Security: prevent directory traversal
    if (!isPathWithinDir(jobDir, filePath)) {
      return res.status(403).json({ message: 'Access denied' })
    }
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      return res.status(404).json({ message: 'File not found' })
    }

    log.info({ jobId, filename }, 'Downloading job artifact')

    // Safe filename for Content-Disposition: no CR/LF/control chars, escape quotes
    const safeForHeader = filename.replace(/[\0\r\n]/g, '').replace(/"/g, '\\"')
    const asciiSafe = safeForHeader.replace(/[^\x20-\x7E]/g, '_')
    res.setHeader('Content-Disposition', `attachment; filename="${asciiSafe}"`)
    res.setHeader('Content-Type', 'application/octet-stream')

    const fileStream = fs.createReadStream(filePath)
    fileStream.on('error', (err) => {
      log.error({ err, jobId, filename }, 'Download stream failed')
      if (!res.headersSent) {
        res.status(500).json({ message: 'Download failed' })
      } else {
        res.destroy(err)
      }
    })
    fileStream.pipe(res)
  })

  return router
}
