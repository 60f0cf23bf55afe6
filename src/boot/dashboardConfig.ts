import { loadDashboardConfig } from 'src/utils/dashboardConfig';

export default async function bootDashboardConfig() {
  // Load dashboard configuration from backend at app startup
  await loadDashboardConfig();
}
