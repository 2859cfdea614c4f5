import express from 'express';
import type { Request, Response } from 'express';
import { asyncHandler, currentNamespace } from '../middleware/requireAuth';
import type { AppServices } from '../services/container';
import { exportFilename } from '../services/exporters';

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export function createExportsRouter({ exporter }: Pick<AppServices, 'exporter'>) {
  const router = express.Router();

  router.get('/export-json/:docId', asyncHandler(async (req: Request, res: Response) => {
    const docId = req.params.docId;
    const json = await exporter.toJson(currentNamespace(req), docId);
    res.attachment(exportFilename(docId, 'json'));
    res.type('application/json').send(json);
  }));

  router.get('/export-word/:docId', asyncHandler(async (req: Request, res: Response) => {
    const docId = req.params.docId;
    const buffer = await exporter.toWord(currentNamespace(req), docId);
    res.attachment(exportFilename(docId, 'docx'));
    res.type(DOCX_MIME).send(buffer);
  }));

  return router;
}

export default createExportsRouter;
