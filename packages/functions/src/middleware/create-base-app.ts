import express from 'express';
import cors from 'cors';
import { stripPathPrefix } from './strip-path-prefix.js';

/**
 * Create an Express app with the standard middleware stack.
 * Handlers add their routes and finish with the error handler.
 */
export function createBaseApp(resourceName: string): express.Application {
  const app = express();
  app.use(cors({ origin: true }));
  app.use(express.json());
  app.use(stripPathPrefix(resourceName));
  return app;
}
