import { createServer } from 'http';
import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { connectMongoDB } from './config/database';
import { getPipelineConfig } from './config/pipeline';
import logger from './utils/logger';
import { createApp } from './app';
import { CarabidCountPipeline } from './services/carabid/pipeline';
import type { CarabidDataProvider } from './services/carabid/providers/dataProvider';
import { FileCarabidDataProvider } from './services/carabid/providers/fileProvider';
import { MongoCarabidDataProvider } from './services/carabid/providers/mongoProvider';

// Load env from multiple candidates; later files override earlier values
const candidateEnvPaths = [
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '../.env'),
];

dotenv.config();
for (const p of candidateEnvPaths) {
  if (fs.existsSync(p)) {
    dotenv.config({ path: p, override: true });
  }
}

const PORT = process.env.BACKEND_PORT || 5000;

// A local CSV cache takes precedence over MongoDB
const createProvider = async (): Promise<CarabidDataProvider> => {
  const dataDir = process.env.CARABID_DATA_DIR;
  if (dataDir) {
    logger.info(`📂 Reading carabid tables from ${path.resolve(dataDir)}`);
    return new FileCarabidDataProvider(path.resolve(dataDir));
  }
  await connectMongoDB();
  return new MongoCarabidDataProvider(process.env.CARABID_DEFAULT_DATASET || 'default');
};

const startServer = async () => {
  try {
    const provider = await createProvider();
    const pipeline = new CarabidCountPipeline(provider, getPipelineConfig());
    const app = createApp({ pipeline });
    const httpServer = createServer(app);

    httpServer.listen(PORT, () => {
      logger.info(`🚀 Server running on port ${PORT}`);
      logger.info(`📚 API Documentation available at http://localhost:${PORT}/api-docs`);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

void startServer();
