/**
 * Express HTTP server setup: security headers, access log, admission
 * control, then dispatch to the static handler or the backend
 */

import express, { type Request, type Response, type NextFunction } from 'express';
import helmet from 'helmet';
import { admissionFilter } from './admission.js';
import { ErrorCode, toGatewayError } from './errors.js';
import { forwardRequest } from './forwarder.js';
import { Logger } from './logger.js';
import { createRouter, type Router } from './router.js';
import { serveStatic } from './static-handler.js';
import type { ResolvedConfig, Route } from './types.js';

/**
 * Route table for a configuration: the static mounts plus the "/" catch-all
 */
export function routesFor(config: ResolvedConfig): Route[] {
  const routes: Route[] = [
    { prefix: config.staticUrlPrefix, kind: 'static', root: config.staticRoot },
  ];
  if (config.media) {
    routes.push({ prefix: config.media.prefix, kind: 'static', root: config.media.root });
  }
  routes.push({ prefix: '/', kind: 'dynamic' });
  return routes;
}

/**
 * Create and configure Express application
 * Exports app for testing without starting the server
 */
export function createApp(
  config: ResolvedConfig,
  logger: Logger = new Logger('gateway', config.logLevel)
): express.Application {
  const app = express();
  const router: Router = createRouter(routesFor(config));
  const accessLog = logger.child('access');

  // Security headers; page policy (CSP) belongs to the backend application
  app.use(helmet({ contentSecurityPolicy: false }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const started = process.hrtime.bigint();
    res.once('close', () => {
      const ms = Number((process.hrtime.bigint() - started) / 1_000_000n);
      const outcome = res.writableFinished ? String(res.statusCode) : 'aborted';
      accessLog.info(`${req.method} ${req.originalUrl} ${outcome} ${ms}ms`);
    });
    next();
  });

  // Body limit applies to every route, before dispatch
  app.use(admissionFilter(config.maxBodyBytes));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const route = router.route(req.path);

    const handled =
      route.kind === 'static'
        ? serveStatic(req, res, { prefix: route.prefix, root: route.root })
        : forwardRequest(req, res, {
            backend: config.backend,
            timeoutMs: config.backendTimeoutMs,
            documentRoot: config.staticRoot,
            serverPort: config.listenPort,
            logger,
          });

    handled.catch(next);
  });

  /**
   * Global error handler
   * Every failure ends here and becomes a response (or a closed connection)
   */
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const error = toGatewayError(err);

    if (error.status >= 500) {
      logger.error(`${req.method} ${req.originalUrl}: ${error.message}`, error.cause ?? '');
    } else {
      logger.debug(`${req.method} ${req.originalUrl}: ${error.message}`);
    }

    if (res.headersSent) {
      // Part of a response is already out; a clean end would look complete
      res.destroy();
      return;
    }

    if (error.code === ErrorCode.CLIENT_CLOSED || res.destroyed) {
      return;
    }

    res.status(error.status).json({ error: error.publicMessage });
  });

  return app;
}
