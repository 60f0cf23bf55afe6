/**
 * One year of a time-indexed table. `forecast` marks projected rows,
 * `values` holds one entry per column (null where the column has no value).
 */
export interface ForecastRow {
  year: number;
  forecast: boolean;
  values: Record<string, number | null>;
}

// Records as served by the forecast backend
export interface EmissionRecord {
  year: number;
  sector1: string;
  sector2: string;
  forecast: boolean;
  emissions: number | null;
}

export interface ElectricityRecord {
  year: number;
  forecast: boolean;
  electricityConsumptionPerCapita: number | null;
  electricityConsumption: number | null;
  emissions: number | null;
}

export const ELECTRICITY_COLUMNS = {
  perCapita: 'ElectricityConsumptionPerCapita',
  consumption: 'ElectricityConsumption',
  emissions: 'Emissions',
} as const;

export function sortByYear(rows: ForecastRow[]): ForecastRow[] {
  return [...rows].sort((a, b) => a.year - b.year);
}

/**
 * First year of the last run of consecutive years.
 * `[1990, 2000, 2010, 2011, 2012]` starts its consecutive run at 2010.
 */
export function findConsecutiveStart(years: number[]): number | undefined {
  let start = years[0];
  for (let i = 1; i < years.length; i++) {
    const year = years[i];
    const previous = years[i - 1];
    if (year === undefined || previous === undefined) continue;
    if (year - previous !== 1) start = year;
  }
  return start;
}

export function getColumnNames(rows: ForecastRow[]): string[] {
  const names = new Set<string>();
  rows.forEach((row) => Object.keys(row.values).forEach((name) => names.add(name)));
  return [...names];
}

export function forecastFlagsByYear(records: EmissionRecord[]): Map<number, boolean> {
  const flags = new Map<number, boolean>();
  records.forEach((record) => {
    if (!flags.has(record.year)) flags.set(record.year, record.forecast);
  });
  return flags;
}

/**
 * Emission records of one main sector as a wide table with one column per sub-sector,
 * columns sorted by sub-sector code.
 */
export function pivotSector(
  records: EmissionRecord[],
  sector1: string,
  flags: Map<number, boolean> = forecastFlagsByYear(records),
): ForecastRow[] {
  const byYear = new Map<number, ForecastRow>();

  records
    .filter((record) => record.sector1 === sector1)
    .forEach((record) => {
      let row = byYear.get(record.year);
      if (!row) {
        const forecast = flags.get(record.year) ?? record.forecast;
        row = { year: record.year, forecast, values: {} };
        byYear.set(record.year, row);
      }
      row.values[record.sector2] = record.emissions;
    });

  // Columns in sorted order on every row, missing sub-sector years read as gaps
  const rows = sortByYear([...byYear.values()]);
  const columns = getColumnNames(rows).sort();
  rows.forEach((row) => {
    const values: ForecastRow['values'] = {};
    columns.forEach((column) => {
      values[column] = row.values[column] ?? null;
    });
    row.values = values;
  });
  return rows;
}

/**
 * Collapse all value columns into a single column holding their per-year sum.
 */
export function sumColumns(rows: ForecastRow[], columnName: string): ForecastRow[] {
  return rows.map((row) => ({
    year: row.year,
    forecast: row.forecast,
    values: {
      [columnName]: Object.values(row.values).reduce<number>((sum, value) => sum + (value ?? 0), 0),
    },
  }));
}

export function electricityRows(records: ElectricityRecord[]): ForecastRow[] {
  return sortByYear(
    records.map((record) => ({
      year: record.year,
      forecast: record.forecast,
      values: {
        [ELECTRICITY_COLUMNS.perCapita]: record.electricityConsumptionPerCapita,
        [ELECTRICITY_COLUMNS.consumption]: record.electricityConsumption,
        [ELECTRICITY_COLUMNS.emissions]: record.emissions,
      },
    })),
  );
}

/**
 * Total emissions of all sectors in a year
 */
export function totalForYear(records: EmissionRecord[], year: number): number {
  return records
    .filter((record) => record.year === year)
    .reduce((sum, record) => sum + (record.emissions ?? 0), 0);
}

