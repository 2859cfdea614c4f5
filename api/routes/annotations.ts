import express from 'express';
import type { Request, Response } from 'express';
import { asyncHandler, currentNamespace } from '../middleware/requireAuth';
import { annotationIndexSchema, saveAnnotationSchema } from '../schemas';
import type { AppServices } from '../services/container';

export function createAnnotationsRouter({ annotations }: Pick<AppServices, 'annotations'>) {
  const router = express.Router();

  router.post('/save-annotation', asyncHandler(async (req: Request, res: Response) => {
    const { doc_id, ...candidate } = saveAnnotationSchema.parse(req.body);
    const list = await annotations.save(currentNamespace(req), doc_id, candidate);
    res.json({ status: 'saved', annotations: list });
  }));

  router.get('/annotations/:docId', asyncHandler(async (req: Request, res: Response) => {
    res.json(await annotations.list(currentNamespace(req), req.params.docId));
  }));

  router.delete('/annotations/:docId/:index', asyncHandler(async (req: Request, res: Response) => {
    const index = annotationIndexSchema.parse(req.params.index);
    await annotations.deleteAt(currentNamespace(req), req.params.docId, index);
    res.json({ status: 'annotation deleted' });
  }));

  return router;
}

export default createAnnotationsRouter;
