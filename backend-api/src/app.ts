import express from 'express';
import cors from 'cors';

import { healthRouter } from './routes/health.js';
import { authRouter } from './routes/auth.js';
import { requestsRouter } from './routes/requests.js';
import { errorHandler } from './middleware/errorHandler.js';

export function createApp() {
  const app = express();
  app.use(cors());
  // base64 attachments travel inside the JSON body
  app.use(express.json({ limit: '20mb' }));

  app.use('/health', healthRouter);
  app.use('/auth', authRouter);
  app.use('/requests', requestsRouter);

  // Must be last: centralized error handler.
  app.use(errorHandler);
  return app;
}
