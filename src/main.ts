import { createWebHistory } from 'vue-router';
import bootDashboardConfig from 'src/boot/dashboardConfig';
import { createDashboardApp } from 'src/app';

async function start() {
  await bootDashboardConfig();
  const { app, router } = createDashboardApp(createWebHistory());
  await router.isReady();
  app.mount('#app');
}

start().catch((err) => console.error('Dashboard failed to start:', err));
