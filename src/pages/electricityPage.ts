import {
  ELECTRICITY_COLUMNS,
  electricityRows,
  type ElectricityRecord,
} from 'src/utils/forecastData';
import { PredictionGraph, type ForecastFigure } from 'src/utils/predictionGraph';
import { buildPercentMarks, type SliderConfig } from 'src/utils/sliders';
import type { PageContext, SectorCard } from './emissionsPage';

const SECTOR = 'ElectricityConsumption';

export const SLIDER_MIN = -50;
export const SLIDER_MAX = 20;
export const SLIDER_STEP = 5;

// Slider positions are tenths of a percent of yearly change
export const sliderValueToAdjustment = (value: number) => value / 10;
export const adjustmentToSliderValue = (adjustment: number) => Math.round(adjustment * 10);

export function buildPerCapitaSlider(adjustment: number): SliderConfig {
  return {
    min: SLIDER_MIN,
    max: SLIDER_MAX,
    step: SLIDER_STEP,
    value: adjustmentToSliderValue(adjustment),
    marks: buildPercentMarks(SLIDER_MIN, SLIDER_MAX, 10),
  };
}

export interface ElectricityPageModel {
  perCapitaCard: SectorCard;
  consumptionCard: SectorCard;
  emissionsCard: SectorCard;
}

interface GraphDefinition {
  id: string;
  titleKey: string;
  traceKey: string;
  unitName: string;
  column: string;
  smoothing?: boolean;
}

const GRAPHS: Record<keyof ElectricityPageModel, GraphDefinition> = {
  perCapitaCard: {
    id: 'electricity-consumption-per-capita',
    titleKey: 'electricity.perCapitaTitle',
    traceKey: 'electricity.perCapitaTrace',
    unitName: 'kWh/cap.',
    column: ELECTRICITY_COLUMNS.perCapita,
  },
  consumptionCard: {
    id: 'electricity-consumption',
    titleKey: 'electricity.consumptionTitle',
    traceKey: 'electricity.consumptionTrace',
    unitName: 'GWh',
    column: ELECTRICITY_COLUMNS.consumption,
  },
  emissionsCard: {
    id: 'electricity-consumption-emissions',
    titleKey: 'electricity.emissionsTitle',
    traceKey: 'emissions',
    unitName: 'kt (CO2e)',
    column: ELECTRICITY_COLUMNS.emissions,
    smoothing: true,
  },
};

function makeCard(
  definition: GraphDefinition,
  records: ElectricityRecord[],
  context: PageContext,
): SectorCard {
  const graph = new PredictionGraph({
    sectorName: SECTOR,
    title: context.t(definition.titleKey),
    unitName: definition.unitName,
    smoothing: definition.smoothing ?? false,
    locale: context.locale,
    forecastSuffix: context.t('forecastSuffix'),
  });
  const rows = electricityRows(records);
  if (rows.length) {
    graph.addSeries({
      rows,
      traceName: context.t(definition.traceKey),
      columnName: definition.column,
    });
  }
  const figure: ForecastFigure = graph.getFigure();
  return { id: definition.id, title: context.t(definition.titleKey), figure, linkTo: null };
}

export function buildElectricityPage(
  records: ElectricityRecord[],
  context: PageContext,
): ElectricityPageModel {
  return {
    perCapitaCard: makeCard(GRAPHS.perCapitaCard, records, context),
    consumptionCard: makeCard(GRAPHS.consumptionCard, records, context),
    emissionsCard: makeCard(GRAPHS.emissionsCard, records, context),
  };
}
