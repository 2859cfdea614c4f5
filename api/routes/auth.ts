import express from 'express';
import type { Request, Response } from 'express';
import type { LoginResponse } from '../../src/types/annotations';
import { asyncHandler } from '../middleware/requireAuth';
import { credentialsSchema } from '../schemas';
import type { AppServices } from '../services/container';

export function createAuthRouter({ credentials, sessions }: Pick<AppServices, 'credentials' | 'sessions'>) {
  const router = express.Router();

  router.post('/register', asyncHandler(async (req: Request, res: Response) => {
    const { username, password } = credentialsSchema.parse(req.body);
    await credentials.register(username, password);
    console.log(`Registered user "${username}"`);
    res.status(201).json({ status: 'registered', username });
  }));

  router.post('/login', asyncHandler(async (req: Request, res: Response) => {
    const { username, password } = credentialsSchema.parse(req.body);
    const principal = await credentials.verify(username, password);
    const body: LoginResponse = { token: sessions.createSession(principal), username: principal };
    res.json(body);
  }));

  return router;
}

export default createAuthRouter;
