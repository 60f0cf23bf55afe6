import { graphFlagsForChartType } from 'src/utils/chartTypes';
import {
  forecastFlagsByYear,
  getColumnNames,
  pivotSector,
  sumColumns,
  type EmissionRecord,
  type ForecastRow,
} from 'src/utils/forecastData';
import { PredictionGraph, type ForecastFigure } from 'src/utils/predictionGraph';
import { sectors as sectorConfig, type Sector, type Summary } from 'src/utils/sectors';
import { buildEmissionsSummary } from 'src/utils/summary';
import { getTranslatedText } from 'src/utils/translationHelpers';
import { getPageForEmissionSector } from './registry';

export type Translate = (key: string) => string;

export interface PageContext {
  locale: string;
  t: Translate;
}

export interface SectorCard {
  id: string;
  title: string;
  figure: ForecastFigure;
  linkTo: string | null;
}

export interface EmissionsPageModel {
  sectorCards: SectorCard[];
  totalCard: SectorCard;
  summary: Summary;
}

export interface EmissionsTargets {
  targetYear: number;
  referenceYear: number;
  reductionPercentage: number;
}

const EMISSIONS_UNIT = 'kt';
const SUB_SECTOR_LUMINANCE_START = -0.3;
const SUB_SECTOR_LUMINANCE_STEP = 0.3;

function makeGraph(sectorName: string | null, title: string, context: PageContext) {
  return new PredictionGraph({
    sectorName,
    title,
    unitName: EMISSIONS_UNIT,
    smoothing: true,
    ...graphFlagsForChartType('StackedArea'),
    locale: context.locale,
    forecastSuffix: context.t('forecastSuffix'),
  });
}

/**
 * Stacked emissions of one sector, one series per sub-sector. Sub-sectors are
 * shaded from darker to lighter than the sector colour.
 */
export function makeSectorFigure(
  rows: ForecastRow[],
  sector: Sector,
  context: PageContext,
): ForecastFigure {
  const graph = makeGraph(sector.code, getTranslatedText(sector.name, context.locale), context);
  const columns = getColumnNames(rows);

  if (columns.length === 1) {
    graph.addSeries({ rows, traceName: context.t('emissions') });
  } else {
    columns.forEach((column, idx) => {
      const subsector = sector.subsectors[column];
      graph.addSeries({
        rows,
        traceName: subsector ? getTranslatedText(subsector.name, context.locale) : column,
        columnName: column,
        luminanceChange: SUB_SECTOR_LUMINANCE_START + SUB_SECTOR_LUMINANCE_STEP * idx,
      });
    });
  }
  return graph.getFigure();
}

export function buildEmissionsPage(
  records: EmissionRecord[],
  targets: EmissionsTargets,
  context: PageContext,
  sectors: Sector[] = sectorConfig,
): EmissionsPageModel {
  const flags = forecastFlagsByYear(records);
  const totalGraph = makeGraph(null, context.t('emissionsTotal'), context);
  const sectorCards: SectorCard[] = [];

  sectors.forEach((sector) => {
    const rows = pivotSector(records, sector.code, flags);
    const sectorPage = getPageForEmissionSector(sector.code, null);

    sectorCards.push({
      id: `emissions-${sector.code}`,
      title: getTranslatedText(sector.name, context.locale),
      figure: makeSectorFigure(rows, sector, context),
      linkTo: sectorPage?.path ?? null,
    });

    // Add the summed sector to the all emissions graph
    if (rows.length) {
      totalGraph.addSeries({
        rows: sumColumns(rows, 'Emissions'),
        traceName: getTranslatedText(sector.name, context.locale),
        columnName: 'Emissions',
        historicalColor: sector.color,
      });
    }
  });

  const summary = buildEmissionsSummary({
    records,
    ...targets,
    label: context.t('emissionsTotal'),
    unit: EMISSIONS_UNIT,
  });

  return {
    sectorCards,
    totalCard: {
      id: 'emissions-total',
      title: context.t('emissionsTotal'),
      figure: totalGraph.getFigure(),
      linkTo: null,
    },
    summary,
  };
}
