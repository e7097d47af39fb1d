import express from 'express';
import { setupOpenAPI } from './openapi/index.js';
import { verificationRouter } from './routes/verification.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';

// Two base64 workbooks of up to 10MB each
const BODY_LIMIT = '30mb';

export function createApp(): express.Express {
  const app = express();

  app.use(express.json({ limit: BODY_LIMIT }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(verificationRouter);

  app.use(errorHandler);

  return app;
}
