import { createApp, h } from 'vue';
import { createPinia } from 'pinia';
import { createRouter, RouterView, type RouterHistory } from 'vue-router';
import echartsPlugin from 'src/boot/echarts';
import { createDashboardI18n } from 'src/boot/i18n';
import routes from 'src/router/routes';

export function createDashboardApp(history: RouterHistory, locale?: string) {
  const app = createApp({ name: 'EmissionsDashboard', render: () => h(RouterView) });
  const pinia = createPinia();
  const router = createRouter({ history, routes });
  const i18n = createDashboardI18n(locale);

  app.use(pinia);
  app.use(router);
  app.use(i18n);
  app.use(echartsPlugin);

  return { app, router, pinia, i18n };
}
