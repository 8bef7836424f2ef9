import type { Application } from 'express';
import { dashboardRouter } from '../modules/dashboard/dashboard.router.js';
import { healthRouter } from '../shared/health.router.js';

export const registerAppRoutes = (app: Application) => {
  app.use('/health', healthRouter);
  app.use('/dashboard', dashboardRouter);
};
