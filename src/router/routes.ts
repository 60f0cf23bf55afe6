import type { RouteComponent, RouteRecordRaw } from 'vue-router';
import { dashboardPages, ELECTRICITY_PAGE_ID, EMISSIONS_PAGE_ID } from 'src/pages/registry';

const pageComponents: Record<string, () => Promise<RouteComponent>> = {
  [EMISSIONS_PAGE_ID]: () => import('src/pages/sectors/EmissionsTab').then((m) => m.default),
  [ELECTRICITY_PAGE_ID]: () => import('src/pages/sectors/ElectricityTab').then((m) => m.default),
};

const routes: RouteRecordRaw[] = [
  // Dashboard Layout Routes, one per registered page
  {
    path: '/',
    component: () => import('src/layouts/DashboardLayout').then((m) => m.default),
    children: dashboardPages.flatMap((page): RouteRecordRaw[] => {
      const component = pageComponents[page.id];
      if (!component) return [];
      return [{ path: page.path.replace(/^\//, ''), name: page.id, component }];
    }),
  },

  // Always leave this as last one
  {
    path: '/:catchAll(.*)*',
    component: () => import('src/pages/ErrorNotFound').then((m) => m.default),
  },
];

export default routes;
