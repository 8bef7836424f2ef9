import { DashboardScreen } from './modules/dashboard/DashboardScreen';

export const App = () => <DashboardScreen />;
