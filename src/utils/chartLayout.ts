/**
 * Shared layout for forecast charts.
 *
 * Objects built here are ECharts option sections: `makeLayout` returns the
 * defaults every dashboard graph starts from, merged section by section with
 * the overrides of a particular graph.
 */

export const CHART_HEIGHT = 450;
export const AXIS_FONT_FAMILY = 'Roboto, Arial';
export const FONT_FAMILY = 'Roboto, Open Sans, Arial';
export const GRID_COLOR = '#ccc';

export type TickInterval = (index: number, value: string) => boolean;

export interface AxisLabel {
  fontFamily: string;
  fontSize: number;
  interval?: TickInterval;
  formatter?: (value: number) => string;
}

export interface YearAxis {
  type: 'category';
  data: string[];
  boundaryGap: boolean;
  axisLine: { show: boolean };
  axisTick: { show: boolean; alignWithLabel: boolean; interval?: TickInterval };
  axisLabel: AxisLabel;
  splitLine: { show: boolean };
}

export interface ValueAxis {
  type: 'value';
  name?: string;
  min?: number;
  max?: number;
  axisLabel: AxisLabel;
  splitLine: { show: boolean; lineStyle: { color: string; width: number } };
}

export interface HoverPoint {
  seriesName?: string;
  value?: unknown;
}

export interface ChartTooltip {
  trigger: 'item' | 'axis';
  formatter?: (params: HoverPoint | HoverPoint[]) => string;
}

export interface ChartLegend {
  show: boolean;
  top?: number | string;
  left?: number | string;
}

export interface ChartGrid {
  top: number;
  right: number;
  left: number;
  bottom: number;
  containLabel: boolean;
}

export interface ChartTitle {
  text: string;
  textStyle: { fontWeight: 'bold'; fontFamily: string };
}

export interface ChartLayout {
  title?: ChartTitle;
  grid: ChartGrid;
  xAxis: YearAxis;
  yAxis: ValueAxis;
  legend: ChartLegend;
  tooltip: ChartTooltip;
  textStyle: { fontFamily: string };
  backgroundColor: string;
}

export interface LayoutOverrides {
  title?: string;
  grid?: Partial<ChartGrid>;
  xAxis?: Partial<Omit<YearAxis, 'axisLabel'>> & { axisLabel?: Partial<AxisLabel> };
  yAxis?: Partial<Omit<ValueAxis, 'axisLabel'>> & { axisLabel?: Partial<AxisLabel> };
  legend?: Partial<ChartLegend>;
  tooltip?: Partial<ChartTooltip>;
}

export function makeLayout(overrides: LayoutOverrides = {}): ChartLayout {
  const axisLabel: AxisLabel = { fontFamily: AXIS_FONT_FAMILY, fontSize: 14 };

  const layout: ChartLayout = {
    grid: { top: 30, right: 15, left: 60, bottom: 30, containLabel: false, ...overrides.grid },
    xAxis: {
      type: 'category',
      data: [],
      boundaryGap: false,
      axisLine: { show: false },
      axisTick: { show: true, alignWithLabel: true },
      splitLine: { show: false },
      ...overrides.xAxis,
      axisLabel: { ...axisLabel, ...overrides.xAxis?.axisLabel },
    },
    yAxis: {
      type: 'value',
      splitLine: { show: true, lineStyle: { color: GRID_COLOR, width: 1 } },
      ...overrides.yAxis,
      axisLabel: { ...axisLabel, ...overrides.yAxis?.axisLabel },
    },
    // Legend stays hidden unless a graph asks for one
    legend: { show: overrides.legend !== undefined, ...overrides.legend },
    tooltip: { trigger: 'item', ...overrides.tooltip },
    textStyle: { fontFamily: FONT_FAMILY },
    backgroundColor: '#fff',
  };

  if (overrides.title) {
    layout.title = {
      text: overrides.title,
      textStyle: { fontWeight: 'bold', fontFamily: FONT_FAMILY },
    };
  }

  return layout;
}

/**
 * Years that get a tick mark on the year axis.
 *
 * The first year, the forecast start year and the last year always get a
 * tick; in between only years divisible by five that are at least three years
 * after the previous tick.
 */
export function buildYearTicks(
  minYear: number,
  maxYear: number,
  forecastStartYear?: number,
): number[] {
  const ticks: number[] = [];
  for (let year = minYear; year <= maxYear; year++) {
    const previous = ticks[ticks.length - 1];
    if (year !== forecastStartYear && previous !== undefined && year !== maxYear) {
      if (year - previous < 3) continue;
      if (year % 5 !== 0) continue;
    }
    ticks.push(year);
  }
  return ticks;
}

/**
 * Axis interval callback showing labels and ticks only on the given years
 */
export function tickIntervalFor(ticks: number[]): TickInterval {
  const labels = new Set(ticks.map(String));
  return (_index, value) => labels.has(value);
}

