import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import mongoSanitize from 'express-mongo-sanitize';
import compression from 'compression';
import cookieParser from 'cookie-parser';
import hpp from 'hpp';
import { Settings } from './config/settings';
import { API_PREFIX, setupSwagger } from './config/swagger';
import { createAuthenticate } from './middleware/auth.middleware';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { requestLogger } from './middleware/logger.middleware';
import { createRateLimiters } from './middleware/rateLimit.middleware';
import { createV1Router } from './routes/v1';
import { Services } from './services';

type AppSettings = Pick<Settings, 'environment' | 'port' | 'corsOrigin' | 'rateLimitWindowMs' | 'rateLimitMax'>;

export const createApp = (services: Services, settings: AppSettings): Express => {
  const app: Express = express();
  const limiters = createRateLimiters(settings);

  // Security middleware
  app.use(helmet());
  app.use(
    cors({
      origin: settings.corsOrigin,
      credentials: true,
    })
  );
  app.use(mongoSanitize());
  app.use(hpp());

  // Body parsing middleware
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));
  app.use(cookieParser());

  app.use(compression());

  if (settings.environment !== 'test') {
    app.use(requestLogger);
  }

  app.use('/api', limiters.general);

  app.get('/health', (_req, res) => {
    res.status(200).json({
      success: true,
      message: 'Server is healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: settings.environment,
    });
  });

  app.get(API_PREFIX, (_req, res) => {
    res.status(200).json({
      success: true,
      message: 'Campus Registry API v1',
      version: '1.0.0',
      documentation: '/docs',
    });
  });

  setupSwagger(app, settings);

  app.use(
    API_PREFIX,
    createV1Router({
      services,
      authenticate: createAuthenticate(services.auth),
      limiters,
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
