import express from 'express';
import cors from 'cors';
import { authenticate, validateApiKey } from '../middleware/auth';
import { createEventRoutes } from './events';
import { handleErrors } from './http';
import { createNewsRoutes } from './news';
import { createRegistrationRoutes } from './registrations';
import type { AppDeps } from './types';
import { createUserRoutes } from './users';

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  app.use(cors({ origin: true }));
  app.use(express.json());

  app.use(validateApiKey(deps.config.apiKey));

  app.get('/status', (_req, res) => {
    res.json({
      status: 'healthy',
      services: {
        providers: deps.adapters.map(adapter => adapter.id),
      },
      timestamp: new Date().toISOString(),
    });
  });

  app.use(authenticate(deps.credentials));

  app.use('/events', createEventRoutes(deps));
  app.use('/registrations', createRegistrationRoutes(deps));
  app.use('/news', createNewsRoutes(deps));
  app.use('/users', createUserRoutes(deps));

  app.use(handleErrors);
  return app;
}
