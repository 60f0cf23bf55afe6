/**
 * Available chart types for forecast graphs
 *
 * These types can be used in page configuration by setting the "type" field to
 * one of these values.
 */
export type ChartType =
  | 'StackedArea' // Stacked filled areas - shows composition over time
  | 'Area' // Filled area of a single series
  | 'Line'; // Line chart - shows trends over time

/**
 * How a trace is filled: down to zero, or down to the trace stacked below it
 */
export type FillMode = 'tozeroy' | 'tonexty';

/**
 * Whether the trace outline is drawn at all
 */
export type DrawMode = 'lines' | 'none';

export interface GraphFlags {
  stacked: boolean;
  fill: boolean;
}

export interface TraceStyle {
  fill?: FillMode;
  mode: DrawMode;
}

/**
 * Fill and draw mode of the trace at `index` in a graph.
 *
 * Stacked traces above the first fill down to the previous trace, every other
 * filled trace fills down to zero. Filled graphs draw no outline.
 *
 * @example
 * ```typescript
 * getTraceStyle({ stacked: true, fill: true }, 1);
 * // Returns: { fill: 'tonexty', mode: 'none' }
 * ```
 */
export function getTraceStyle(flags: GraphFlags, index: number): TraceStyle {
  const style: TraceStyle = { mode: flags.fill ? 'none' : 'lines' };
  if (flags.stacked || flags.fill) {
    style.fill = flags.stacked && index > 0 ? 'tonexty' : 'tozeroy';
  }
  return style;
}

/**
 * PredictionGraph flags for a named chart type
 */
export function graphFlagsForChartType(chartType: ChartType): GraphFlags {
  switch (chartType) {
    case 'StackedArea':
      return { stacked: true, fill: true };
    case 'Area':
      return { stacked: false, fill: true };
    case 'Line':
    default:
      return { stacked: false, fill: false };
  }
}

