import type { TranslationObject } from 'src/utils/translationHelpers';

export const EMISSIONS_PAGE_ID = 'emissions';
export const ELECTRICITY_PAGE_ID = 'electricity-consumption';

export interface DashboardPage {
  id: string;
  name: string | TranslationObject;
  path: string;
  // Emission sector (main sector, sub-sector) whose numbers the page explains
  emissionSector?: [string, string | null];
}

export const dashboardPages: DashboardPage[] = [
  {
    id: EMISSIONS_PAGE_ID,
    name: { enUS: 'Greenhouse gas emissions', fiFI: 'Kasvihuonekaasupäästöt' },
    path: '/',
  },
  {
    id: ELECTRICITY_PAGE_ID,
    name: { enUS: 'Consumer electricity', fiFI: 'Kulutussähkö' },
    path: '/electricity',
    emissionSector: ['ElectricityConsumption', null],
  },
];

/**
 * Page that owns an emission sector. A page registered for the main sector
 * only also covers every sub-sector of it.
 */
export function getPageForEmissionSector(
  sector1: string,
  sector2: string | null = null,
): DashboardPage | undefined {
  const owns = (page: DashboardPage, sub: string | null) =>
    page.emissionSector !== undefined &&
    page.emissionSector[0] === sector1 &&
    page.emissionSector[1] === sub;

  return (
    dashboardPages.find((page) => owns(page, sector2)) ??
    dashboardPages.find((page) => owns(page, null))
  );
}
