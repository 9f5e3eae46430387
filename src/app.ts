import express from 'express';
import helmet from 'helmet';
import pino from 'pino';
import type { Queryable } from './db/pg-result-set.js';
import { errorHandler } from './middleware/error-handler.js';
import { membershipsResultSet } from './models/memberships.js';
import { peopleResultSet } from './models/people.js';
import type { DoesPaging } from './paging/does-paging.js';
import { healthRouter } from './routes/health.js';
import { resourceRouter } from './routes/resource.js';

const logger = pino({ name: 'http' });

export function createApp(db: Queryable, paging: DoesPaging): express.Express {
  const app = express();

  // Security headers
  app.use(helmet());
  app.use(express.json());
  // Grid widgets post their deletions as form data
  app.use(express.urlencoded({ extended: false }));

  // Request logging middleware
  app.use((req, _res, next) => {
    logger.info({ method: req.method, url: req.url }, 'request');
    next();
  });

  app.use(healthRouter(db));
  app.use('/api/people', resourceRouter({ name: 'people', paging, resultSet: () => peopleResultSet(db) }));
  app.use('/api/memberships', resourceRouter({ name: 'memberships', paging, resultSet: () => membershipsResultSet(db) }));

  app.use(errorHandler);

  return app;
}
