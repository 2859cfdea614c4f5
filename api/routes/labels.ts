import express from 'express';
import type { Request, Response } from 'express';
import { asyncHandler, currentNamespace } from '../middleware/requireAuth';
import { labelSchema } from '../schemas';
import type { AppServices } from '../services/container';

export function createLabelsRouter({ labels }: Pick<AppServices, 'labels'>) {
  const router = express.Router();

  router.get('/', asyncHandler(async (req: Request, res: Response) => {
    res.json(await labels.list(currentNamespace(req)));
  }));

  router.post('/', asyncHandler(async (req: Request, res: Response) => {
    const { name, color } = labelSchema.parse(req.body);
    await labels.set(currentNamespace(req), name, color);
    res.json({ status: 'label saved' });
  }));

  router.delete('/:labelName', asyncHandler(async (req: Request, res: Response) => {
    await labels.remove(currentNamespace(req), req.params.labelName);
    res.json({ status: 'label deleted' });
  }));

  return router;
}

export default createLabelsRouter;
