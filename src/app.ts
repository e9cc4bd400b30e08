import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import swaggerUi from 'swagger-ui-express';
import { errorHandler } from './middleware/errorHandler';
import { buildSwaggerSpec } from './config/swagger';
import logger from './utils/logger';
import { CarabidCountPipeline } from './services/carabid/pipeline';
import { createCarabidRouter } from './routes/carabid';

export interface AppOptions {
  pipeline: CarabidCountPipeline;
  enableDocs?: boolean;
  corsOrigin?: string;
}

export function createApp({ pipeline, enableDocs = true, corsOrigin }: AppOptions): Application {
  const app: Application = express();

  // Middleware
  app.use(helmet());
  app.use(cors({
    origin: corsOrigin || process.env.CORS_ORIGIN || 'http://localhost:3000',
    credentials: true,
  }));
  app.use(compression());
  app.use(express.json({ limit: '10mb' }));
  app.use(morgan('combined', { stream: { write: (message) => logger.info(message.trim()) } }));

  // API Documentation
  if (enableDocs) {
    const swaggerSpec = buildSwaggerSpec();
    app.get('/api-docs.json', (req: Request, res: Response) => {
      res.json(swaggerSpec);
    });
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(undefined, { swaggerOptions: { url: '/api-docs.json' } }));
  }

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      provider: pipeline.providerName,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/carabid', createCarabidRouter(pipeline));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Route not found' });
  });

  // Error handler
  app.use(errorHandler);

  return app;
}

export default createApp;
