import { deriveColor } from './colors';
import { getTraceStyle, type TraceStyle } from './chartTypes';
import {
  buildYearTicks,
  makeLayout,
  tickIntervalFor,
  type ChartLayout,
  type HoverPoint,
} from './chartLayout';
import { findConsecutiveStart, getColumnNames, sortByYear, type ForecastRow } from './forecastData';
import { formatHoverLabel, formatTick } from './format';
import { getSectorColor } from './sectors';

export class ChartConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChartConfigError';
  }
}

/**
 * One plotted line or area, as an ECharts line series
 */
export interface ForecastTrace {
  type: 'line';
  name: string;
  data: Array<[string, number]>;
  smooth: boolean;
  showSymbol: boolean;
  stack?: 'history' | 'forecast';
  areaStyle?: { color: string; opacity: number; origin: 'auto' };
  lineStyle: { color: string; width: number; type: 'solid' | 'dashed' };
  itemStyle: { color: string };
}

export interface ForecastFigure extends ChartLayout {
  series: ForecastTrace[];
}

export interface PredictionGraphOptions {
  sectorName?: string | null;
  title?: string;
  unitName?: string;
  yMax?: number;
  smoothing?: boolean;
  fill?: boolean;
  stacked?: boolean;
  allowNonconsecutiveYears?: boolean;
  locale?: string;
  forecastSuffix?: string;
}

export interface SeriesOptions {
  rows: ForecastRow[];
  traceName: string;
  columnName?: string;
  historicalColor?: string;
  forecastColor?: string;
  luminanceChange?: number;
}

const LINE_WIDTH = 4;

export class PredictionGraphSeries {
  readonly rows: ForecastRow[];
  readonly traceName: string;
  readonly columnName: string;
  readonly historicalColor?: string;
  readonly forecastColor?: string;
  readonly luminanceChange: number;

  constructor(
    private readonly graph: PredictionGraph,
    options: SeriesOptions,
  ) {
    this.rows = sortByYear(options.rows);
    this.traceName = options.traceName;
    this.historicalColor = options.historicalColor;
    this.forecastColor = options.forecastColor;
    this.luminanceChange = options.luminanceChange ?? 0;

    const columns = getColumnNames(this.rows);
    if (!options.columnName) {
      // Without an explicit column there must be exactly one to plot
      const [only] = columns;
      if (columns.length !== 1 || only === undefined) {
        throw new ChartConfigError(
          `Series "${this.traceName}" needs a column name, data has ${columns.length} columns`,
        );
      }
      this.columnName = only;
    } else {
      if (!columns.includes(options.columnName)) {
        throw new ChartConfigError(`Column "${options.columnName}" not found in series data`);
      }
      this.columnName = options.columnName;
    }
  }

  get years(): number[] {
    return this.rows.map((row) => row.year);
  }

  /**
   * Last year that is not a forecast, if the series has history
   */
  get lastHistoricalYear(): number | undefined {
    const historical = this.rows.filter((row) => !row.forecast);
    return historical[historical.length - 1]?.year;
  }

  getColor(forecast = false): string {
    const explicit = forecast ? this.forecastColor : this.historicalColor;
    if (explicit) return explicit;

    const base =
      forecast && this.historicalColor
        ? this.historicalColor
        : getSectorColor(this.graph.sectorName);
    if (!base) {
      throw new ChartConfigError(
        `No color for series "${this.traceName}" in sector "${this.graph.sectorName ?? ''}"`,
      );
    }
    return deriveColor(base, this.luminanceChange, forecast);
  }

  /**
   * `[year, value]` points of the rows that pass the filter, skipping gaps
   */
  points(filter: (row: ForecastRow) => boolean): Array<[string, number]> {
    const points: Array<[string, number]> = [];
    this.rows.filter(filter).forEach((row) => {
      const value = row.values[this.columnName];
      if (value !== null && value !== undefined && !Number.isNaN(value)) {
        points.push([String(row.year), value]);
      }
    });
    return points;
  }
}

export class PredictionGraph {
  readonly sectorName: string | null;
  readonly title?: string;
  readonly unitName?: string;
  readonly yMax?: number;
  readonly smoothing: boolean;
  readonly fill: boolean;
  readonly stacked: boolean;
  readonly allowNonconsecutiveYears: boolean;
  readonly locale: string;
  readonly forecastSuffix: string;

  readonly seriesList: PredictionGraphSeries[] = [];
  minYear?: number;
  maxYear?: number;
  forecastStartYear?: number;

  constructor(options: PredictionGraphOptions = {}) {
    this.sectorName = options.sectorName ?? null;
    this.title = options.title;
    this.unitName = options.unitName;
    this.yMax = options.yMax;
    this.smoothing = options.smoothing ?? false;
    this.fill = options.fill ?? false;
    this.stacked = options.stacked ?? false;
    this.allowNonconsecutiveYears = options.allowNonconsecutiveYears ?? false;
    this.locale = options.locale ?? 'en-US';
    this.forecastSuffix = options.forecastSuffix ?? '(forecast)';
  }

  addSeries(options: SeriesOptions): PredictionGraphSeries {
    const series = new PredictionGraphSeries(this, options);
    this.seriesList.push(series);

    const years = series.years;
    const first = years[0];
    const last = years[years.length - 1];
    if (first !== undefined && (this.minYear === undefined || first < this.minYear)) {
      this.minYear = first;
    }
    if (last !== undefined && (this.maxYear === undefined || last > this.maxYear)) {
      this.maxYear = last;
    }

    // The graph's forecast starts where the earliest-ending history ends
    const lastHistorical = series.lastHistoricalYear;
    if (
      lastHistorical !== undefined &&
      (this.forecastStartYear === undefined || lastHistorical < this.forecastStartYear)
    ) {
      this.forecastStartYear = lastHistorical;
    }
    return series;
  }

  getTracesForSeries(series: PredictionGraphSeries, index: number): ForecastTrace[] {
    const style = getTraceStyle({ stacked: this.stacked, fill: this.fill }, index);
    const startYear = this.allowNonconsecutiveYears
      ? series.years[0]
      : findConsecutiveStart(series.years);

    const histPoints = series.points(
      (row) => !row.forecast && startYear !== undefined && row.year >= startYear,
    );
    const traces: ForecastTrace[] = [];

    let forecastPoints: Array<[string, number]>;
    const lastHist = histPoints[histPoints.length - 1];
    if (lastHist) {
      traces.push(this.makeTrace(series, histPoints, false, style));
      // Forecast continues from the last historical point so the traces connect
      const lastHistYear = Number(lastHist[0]);
      forecastPoints = series.points((row) => row.forecast || row.year === lastHistYear);
    } else {
      forecastPoints = series.points((row) => row.forecast);
    }

    if (forecastPoints.length) {
      traces.unshift(this.makeTrace(series, forecastPoints, true, style));
    }
    return traces;
  }

  private makeTrace(
    series: PredictionGraphSeries,
    data: Array<[string, number]>,
    forecast: boolean,
    style: TraceStyle,
  ): ForecastTrace {
    const color = series.getColor(forecast);
    const trace: ForecastTrace = {
      type: 'line',
      name: forecast ? `${series.traceName} ${this.forecastSuffix}` : series.traceName,
      data,
      smooth: this.smoothing,
      showSymbol: false,
      lineStyle: {
        color,
        width: style.mode === 'none' ? 0 : LINE_WIDTH,
        type: forecast && !this.fill ? 'dashed' : 'solid',
      },
      itemStyle: { color },
    };

    if (this.stacked) {
      trace.stack = forecast ? 'forecast' : 'history';
    }
    if (style.fill) {
      // Stacking fills down to the previous trace, so both fill modes map to an area
      // and only the opacity tells filled graphs from stacked lines
      trace.areaStyle = { color, opacity: this.fill ? 1 : 0.5, origin: 'auto' };
    }
    return trace;
  }

  getFigure(): ForecastFigure {
    const ticks =
      this.minYear !== undefined && this.maxYear !== undefined
        ? buildYearTicks(this.minYear, this.maxYear, this.forecastStartYear)
        : [];
    const years: string[] = [];
    if (this.minYear !== undefined && this.maxYear !== undefined) {
      for (let year = this.minYear; year <= this.maxYear; year++) years.push(String(year));
    }
    const interval = tickIntervalFor(ticks);

    const layout = makeLayout({
      title: this.title,
      yAxis: {
        name: this.unitName,
        axisLabel: { formatter: (value) => formatTick(value, this.locale) },
        ...(this.yMax ? { min: 0, max: this.yMax } : {}),
      },
      xAxis: {
        data: years,
        axisLabel: { interval },
        axisTick: { show: true, alignWithLabel: true, interval },
      },
      tooltip: {
        trigger: 'item',
        formatter: (params) => this.formatHover(params),
      },
    });

    const series = this.seriesList.flatMap((s, index) => this.getTracesForSeries(s, index));
    return { ...layout, series };
  }

  /**
   * Hover text `<trace name><br/><year>: <value> <unit>`
   */
  formatHover(params: HoverPoint | HoverPoint[]): string {
    const point = Array.isArray(params) ? params[0] : params;
    if (!point || !Array.isArray(point.value)) return '';
    const pair: unknown[] = point.value;
    const [year, value] = pair;
    if (typeof value !== 'number') return '';
    const label = formatHoverLabel(String(year), value, this.unitName, this.locale);
    return point.seriesName ? `${point.seriesName}<br/>${label}` : label;
  }
}
