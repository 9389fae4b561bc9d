import 'dotenv/config';
import express from 'express';
import { loadBotConfig } from '../core/config';
import { registerRoutes } from './routes';

const config = loadBotConfig();
const app = express();
const desiredPort = Number(process.env.UI_PORT || config.uiPort || 8788);
const desiredBind = process.env.UI_BIND || config.uiBind || '127.0.0.1';

registerRoutes(app);

const server = app.listen(desiredPort, desiredBind, () => {
  const address = server.address();
  const port = typeof address === 'object' && address ? address.port : desiredPort;
  console.log(`Audit API running at http://${desiredBind}:${port}`);
});
server.on('error', (err: NodeJS.ErrnoException) => {
  console.error(`Audit API failed to start (${err.code ?? 'unknown'})`, err);
  process.exitCode = 1;
});
