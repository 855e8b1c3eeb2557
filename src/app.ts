import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import hpp from 'hpp';
import { env } from './config';
import { errorHandler, notFound, requestLogger } from './middlewares';
import routes from './routes';
import { sendError } from './utils';

/**
 * Create and configure Express application
 */
export const createApp = (): Application => {
  const app = express();

  // Security middleware
  app.use(helmet()); // Set security HTTP headers
  app.use(hpp()); // Prevent HTTP Parameter Pollution

  // CORS configuration
  app.use(
    cors({
      origin: (origin, callback) => {
        // Allow requests with no origin (like mobile apps or curl)
        if (!origin) return callback(null, true);

        const allowedOrigins = env.CORS_ORIGIN;

        if (allowedOrigins.includes('*') || allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(null, false);
        }
      },
      credentials: true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept'],
    })
  );

  // Rate limiting
  const limiter = rateLimit({
    windowMs: env.RATE_LIMIT_WINDOW_MS,
    max: env.RATE_LIMIT_MAX_REQUESTS,
    handler: (_req, res, _next, options) => {
      sendError(res, 'Too many requests, please try again later', options.statusCode);
    },
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use(limiter);

  // JSON bodies only; uploads are multipart and go through multer on their route
  app.use(express.json({ limit: env.JSON_BODY_LIMIT }));

  // Compression middleware
  app.use(compression());

  // Request logging
  app.use(requestLogger);

  // API routes
  app.use(env.API_PREFIX, routes);

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      success: true,
      message: 'Name Reconciliation API',
      version: '1.0.0',
      matching: `${env.API_PREFIX}/matching`,
      reconciliation: `${env.API_PREFIX}/reconciliation`,
      health: `${env.API_PREFIX}/health`,
      timestamp: new Date().toISOString(),
    });
  });

  // Handle 404 - Route not found
  app.use(notFound);

  // Global error handler
  app.use(errorHandler);

  return app;
};

export default createApp;
