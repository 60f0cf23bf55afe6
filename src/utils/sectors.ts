import type { TranslationObject } from './translationHelpers';
import sectorsJSON from 'src/config/sectors.json';

export interface Subsector {
  name: string | TranslationObject;
}

export interface Sector {
  code: string;
  name: string | TranslationObject;
  color: string;
  subsectors: Record<string, Subsector | undefined>;
}

export const sectors: Sector[] = sectorsJSON;

export function findSector(code: string | null | undefined): Sector | undefined {
  if (!code) return undefined;
  return sectors.find((s) => s.code === code);
}

/**
 * Main colour of an emission sector, or undefined for unknown sectors
 */
export function getSectorColor(code: string | null | undefined): string | undefined {
  return findSector(code)?.color;
}

export interface SummaryData {
  label: string;
  goal: number;
  value: number;
  unit: string;
  belowGoalGood: boolean;
}

export interface Summary extends SummaryData {
  difference: number;
  isGood: boolean;
}
