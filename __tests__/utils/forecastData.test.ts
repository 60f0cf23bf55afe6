import { describe, expect, it } from 'vitest';
import {
  electricityRows,
  findConsecutiveStart,
  forecastFlagsByYear,
  getColumnNames,
  pivotSector,
  sumColumns,
  totalForYear,
  type EmissionRecord,
} from 'src/utils/forecastData';

const record = (
  year: number,
  sector1: string,
  sector2: string,
  forecast: boolean,
  emissions: number,
): EmissionRecord => ({ year, sector1, sector2, forecast, emissions });

const records: EmissionRecord[] = [
  record(2018, 'BuildingHeating', 'DistrictHeat', false, 100),
  record(2018, 'BuildingHeating', 'OilHeating', false, 50),
  record(2018, 'Transportation', 'Cars', false, 70),
  record(2020, 'BuildingHeating', 'DistrictHeat', true, 80),
  record(2020, 'BuildingHeating', 'OilHeating', true, 40),
  record(2019, 'BuildingHeating', 'DistrictHeat', false, 90),
];

describe('findConsecutiveStart', () => {
  it('returns the start of the last consecutive run', () => {
    expect(findConsecutiveStart([1990, 2000, 2005, 2010, 2011, 2012])).toBe(2010);
  });

  it('returns the first year when all years are consecutive', () => {
    expect(findConsecutiveStart([2015, 2016, 2017])).toBe(2015);
  });

  it('handles a single year and an empty list', () => {
    expect(findConsecutiveStart([2020])).toBe(2020);
    expect(findConsecutiveStart([])).toBeUndefined();
  });
});

describe('forecastFlagsByYear', () => {
  it('keeps the first flag seen for each year', () => {
    const flags = forecastFlagsByYear([
      record(2020, 'Waste', '', true, 1),
      record(2020, 'Transportation', 'Cars', false, 2),
    ]);
    expect(flags.get(2020)).toBe(true);
  });
});

describe('pivotSector', () => {
  it('builds one row per year with a column per sub-sector', () => {
    const rows = pivotSector(records, 'BuildingHeating');

    expect(rows.map((row) => row.year)).toEqual([2018, 2019, 2020]);
    expect(rows.map((row) => row.forecast)).toEqual([false, false, true]);
    expect(getColumnNames(rows)).toEqual(['DistrictHeat', 'OilHeating']);
    expect(rows[1]?.values).toEqual({ DistrictHeat: 90, OilHeating: null });
  });

  it('sorts sub-sector columns whatever the record order', () => {
    const rows = pivotSector(
      [
        record(2018, 'Transportation', 'Trucks', false, 20),
        record(2018, 'Transportation', 'Cars', false, 70),
        record(2018, 'Transportation', 'Buses', false, 10),
      ],
      'Transportation',
    );

    expect(getColumnNames(rows)).toEqual(['Buses', 'Cars', 'Trucks']);
  });

  it('takes forecast flags from the given map', () => {
    const flags = new Map([
      [2018, false],
      [2019, true],
      [2020, true],
    ]);
    const rows = pivotSector(records, 'BuildingHeating', flags);
    expect(rows.map((row) => row.forecast)).toEqual([false, true, true]);
  });

  it('returns no rows for a sector without records', () => {
    expect(pivotSector(records, 'Waste')).toEqual([]);
  });
});

describe('sumColumns', () => {
  it('sums every column per year, counting gaps as zero', () => {
    const rows = sumColumns(pivotSector(records, 'BuildingHeating'), 'Emissions');
    expect(rows.map((row) => row.values)).toEqual([
      { Emissions: 150 },
      { Emissions: 90 },
      { Emissions: 120 },
    ]);
  });
});

describe('totalForYear', () => {
  it('adds up all sectors of a year', () => {
    expect(totalForYear(records, 2018)).toBe(220);
    expect(totalForYear(records, 1990)).toBe(0);
  });
});

describe('electricityRows', () => {
  it('sorts records by year and names the columns', () => {
    const rows = electricityRows([
      {
        year: 2021,
        forecast: true,
        electricityConsumptionPerCapita: 2100,
        electricityConsumption: 1400,
        emissions: null,
      },
      {
        year: 2020,
        forecast: false,
        electricityConsumptionPerCapita: 2200,
        electricityConsumption: 1450,
        emissions: 300,
      },
    ]);

    expect(rows[0]).toEqual({
      year: 2020,
      forecast: false,
      values: {
        ElectricityConsumptionPerCapita: 2200,
        ElectricityConsumption: 1450,
        Emissions: 300,
      },
    });
    expect(rows[1]?.values.Emissions).toBeNull();
  });
});
