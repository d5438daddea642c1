import express, { Application } from 'express';
import cors, { CorsOptions } from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { env } from './config';
import { errorHandler, notFound, requestLogger } from './middlewares';
import { createRoutes } from './routes';
import { createServices, type Services } from './services';

const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Requests without an Origin header (curl, server-to-server importers) pass
    const allowed = !origin || env.CORS_ORIGIN.includes('*') || env.CORS_ORIGIN.includes(origin);
    callback(null, allowed);
  },
  credentials: true,
  methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept'],
};

const limiter = (): express.RequestHandler =>
  rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX_REQUESTS,
    message: {
      success: false,
      error: 'Too many requests, please try again later',
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

/**
 * Builds the Express application around a service container.
 *
 * @param services - defaults to in-memory repositories and the configured
 *                   tolerances; tests pass their own
 */
export const createApp = (services: Services = createServices()): Application => {
  const app = express();

  app.use(helmet());
  app.use(hpp());
  app.use(cors(corsOptions));
  app.use(limiter());

  // Statement imports can carry thousands of parsed rows
  app.use(express.json({ limit: '10mb' }));
  app.use(compression());
  app.use(requestLogger);

  app.use(env.API_PREFIX, createRoutes(services));

  app.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Ledger Reconciliation API',
      version: '1.0.0',
      endpoints: {
        health: `${env.API_PREFIX}/health`,
        imports: `${env.API_PREFIX}/imports`,
        transactions: `${env.API_PREFIX}/transactions`,
        reconciliation: `${env.API_PREFIX}/reconciliation`,
        recurring: `${env.API_PREFIX}/recurring`,
      },
      timestamp: new Date().toISOString(),
    });
  });

  app.use(notFound);
  app.use(errorHandler);

  return app;
};

export default createApp;
