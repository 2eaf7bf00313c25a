import express, { Express, Request, Response } from 'express';
import cors, { CorsOptions } from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { Env } from './config/index.js';
import { createRoutes, AppServices } from './routes/index.js';
import { errorHandler, notFoundHandler } from './utils/http.js';

export function createApp(config: Pick<Env, 'frontendUrl' | 'nodeEnv'>, services: AppServices): Express {
  const app = express();

  // CORS configuration - Allow multiple origins
  const allowedOrigins = config.frontendUrl.split(',').map(url => url.trim()).filter(Boolean);
  const corsOptions: CorsOptions = {
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // Allow requests with no origin (POS terminals, curl, Shopify)
      if (!origin) return callback(null, true);

      if (allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'));
      }
    },
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
    maxAge: 600 // Cache preflight for 10 minutes
  };
  app.use(helmet());
  app.use(cors(corsOptions));

  if (config.nodeEnv !== 'test') {
    app.use(morgan('dev'));
  }

  // Webhook signatures are computed over the exact bytes Shopify sent
  app.use('/api/webhooks', express.raw({ type: '*/*', limit: '5mb' }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Routes
  app.use('/api', createRoutes(services));

  // Root endpoint
  app.get('/', (_req: Request, res: Response) => {
    res.json({
      message: 'Store POS Sync API',
      version: '1.0',
      features: [
        'Cart-to-order commit',
        'Catalog and customer sync',
        'Webhook reconciliation'
      ]
    });
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export default createApp;
