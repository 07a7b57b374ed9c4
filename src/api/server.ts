import 'dotenv/config';
import express from 'express';
import { buildEngine } from '../engine';
import { registerRoutes } from './routes';

const engine = buildEngine();
const app = express();
registerRoutes(app, engine);

const stopSweep = engine.provider.startExpirySweep();

const startServer = (port: number, bind: string, allowFallback = true) => {
  const server = app.listen(port, bind, () => {
    const address = server.address();
    const actualPort = address && typeof address === 'object' ? address.port : port;
    engine.logger.info({ bind, port: actualPort }, `API running at http://${bind}:${actualPort}`);
  });
  server.on('error', (err: NodeJS.ErrnoException) => {
    if (allowFallback && (err.code === 'EACCES' || err.code === 'EPERM' || err.code === 'EADDRINUSE')) {
      engine.logger.warn({ port, code: err.code }, 'API port blocked; retrying on an ephemeral port');
      startServer(0, bind, false);
      return;
    }
    engine.logger.error({ err: err.message }, 'API failed to start');
    stopSweep();
    process.exit(1);
  });
};

startServer(engine.config.api.port, engine.config.api.bind);
