import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import { registerAppRoutes } from './setupRoutes.js';
import { appConfig } from '../shared/config/appConfig.js';
import { dashboardRepository } from '../modules/dashboard/dashboard.module.js';
import { DatasetError } from '../modules/dashboard/dashboard.types.js';

const bootstrap = async () => {
  // The dataset must load cleanly before any request is served
  await dashboardRepository.load();

  const app = express();
  app.use(cors());
  app.use(express.json());

  registerAppRoutes(app);

  app.listen(appConfig.port, () => {
    console.log(`API server is running on port ${appConfig.port}`);
  });
};

bootstrap().catch((error) => {
  if (error instanceof DatasetError) {
    console.error(`Failed to load the sales dataset (${error.code}): ${error.message}`);
  } else {
    console.error('Failed to start the server:', error);
  }
  process.exit(1);
});
