import express from 'express';
import cors from 'cors';
import type { AppConfig } from './config';
import { errorHandler } from './middleware/errorHandler';
import { requireAuth } from './middleware/requireAuth';
import type { AppServices } from './services/container';

// Mount modular routers
import createAnnotationsRouter from './routes/annotations';
import createAuthRouter from './routes/auth';
import createDocumentsRouter from './routes/documents';
import createExportsRouter from './routes/exports';
import createHealthRouter from './routes/health';
import createLabelsRouter from './routes/labels';

export function createApp(services: AppServices, config: Pick<AppConfig, 'corsOrigin' | 'uploadLimitMb'>) {
  const app = express();
  const bodyLimit = `${config.uploadLimitMb}mb`;

  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: bodyLimit }));
  app.use(express.urlencoded({ extended: true, limit: bodyLimit }));

  app.use('/health', createHealthRouter(services.sessions));
  app.use('/auth', createAuthRouter(services));

  const authenticated = express.Router();
  authenticated.use(requireAuth(services.sessions, services.namespaces));
  authenticated.use(createDocumentsRouter(services, config.uploadLimitMb));
  authenticated.use(createAnnotationsRouter(services));
  authenticated.use('/labels', createLabelsRouter(services));
  authenticated.use(createExportsRouter(services));
  app.use(authenticated);

  app.use(errorHandler);
  return app;
}

export default createApp;
