import { DashboardRepository } from './dashboard.repository.js';
import { DashboardService } from './dashboard.service.js';
import { appConfig } from '../../shared/config/appConfig.js';

export const dashboardRepository = new DashboardRepository(appConfig);
export const dashboardService = new DashboardService(dashboardRepository, { topStates: appConfig.topStates });
