import express from 'express';
import type { Request, Response } from 'express';
import type { SessionRegistry } from '../services/sessions';

export function createHealthRouter(sessions: SessionRegistry) {
  const router = express.Router();

  router.get('/', (req: Request, res: Response) => {
    res.json({ status: 'healthy', node: { status: 'running' }, sessions: sessions.size });
  });

  return router;
}

export default createHealthRouter;
