import 'dotenv/config';
import express from 'express';
import crypto from 'crypto';
import { openEngine } from '../core/engine';
import { registerRoutes } from './routes';

const engine = openEngine();
const app = express();
const csrfToken = process.env.UI_CSRF_TOKEN || crypto.randomUUID();
const desiredPort = Number(process.env.UI_PORT || engine.config.uiPort || 8787);
const desiredBind = process.env.UI_BIND || engine.config.uiBind || '127.0.0.1';

registerRoutes(app, engine, csrfToken);

const server = app.listen(desiredPort, desiredBind, () => {
  const address = server.address();
  const port = address && typeof address === 'object' ? address.port : desiredPort;
  console.log(`Approval API running at http://${desiredBind}:${port}`);
});

server.on('error', (err: NodeJS.ErrnoException) => {
  console.error('Approval API failed to start', err);
  engine.close();
  process.exit(1);
});

const shutdown = () => {
  server.close(() => {
    engine.close();
    process.exit(0);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
