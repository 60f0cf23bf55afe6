import { describe, expect, it } from 'vitest';
import { buildEmissionsPage } from 'src/pages/emissionsPage';
import { getLightness } from 'src/utils/colors';
import type { EmissionRecord } from 'src/utils/forecastData';
import { makeContext } from './testContext';

const record = (
  year: number,
  sector1: string,
  sector2: string,
  emissions: number,
): EmissionRecord => ({ year, sector1, sector2, forecast: year >= 2020, emissions });

const records: EmissionRecord[] = [
  record(2018, 'BuildingHeating', 'DistrictHeat', 300),
  record(2018, 'BuildingHeating', 'OilHeating', 100),
  record(2018, 'Waste', '', 100),
  record(2019, 'BuildingHeating', 'DistrictHeat', 280),
  record(2019, 'BuildingHeating', 'OilHeating', 90),
  record(2019, 'Waste', '', 95),
  record(2020, 'BuildingHeating', 'DistrictHeat', 200),
  record(2020, 'BuildingHeating', 'OilHeating', 50),
  record(2020, 'Waste', '', 50),
];

const targets = { targetYear: 2020, referenceYear: 2018, reductionPercentage: 50 };

describe('buildEmissionsPage', () => {
  it('builds one card per sector and links sectors that have a page', () => {
    const page = buildEmissionsPage(records, targets, makeContext());

    expect(page.sectorCards.map((card) => card.id)).toEqual([
      'emissions-BuildingHeating',
      'emissions-ElectricityConsumption',
      'emissions-Transportation',
      'emissions-Waste',
      'emissions-IndustryAndMachinery',
    ]);
    expect(page.sectorCards.map((card) => card.linkTo)).toEqual([
      null,
      '/electricity',
      null,
      null,
      null,
    ]);
  });

  it('stacks one series per sub-sector, shaded from the sector colour', () => {
    const [heating] = buildEmissionsPage(records, targets, makeContext()).sectorCards;
    const figure = heating?.figure;

    expect(heating?.title).toBe('Building heating');
    expect(figure?.title?.text).toBe('Building heating');
    expect(figure?.series.map((trace) => trace.name)).toEqual([
      'District heating (forecast)',
      'District heating',
      'Oil heating (forecast)',
      'Oil heating',
    ]);
    expect(figure?.series.every((trace) => trace.stack !== undefined && trace.smooth)).toBe(true);

    const districtHeat = figure?.series[1]?.lineStyle.color ?? '';
    expect(getLightness(districtHeat)).toBeLessThan(getLightness('#e5702a'));
  });

  it('shades sub-sectors the same whatever the record order', () => {
    const colors = (input: EmissionRecord[]) =>
      buildEmissionsPage(input, targets, makeContext()).sectorCards[0]?.figure.series.map(
        (trace) => `${trace.name} ${trace.lineStyle.color}`,
      );

    expect(colors([...records].reverse())).toEqual(colors(records));
  });

  it('names single-column sectors after the emissions', () => {
    const waste = buildEmissionsPage(records, targets, makeContext()).sectorCards[3];
    expect(waste?.figure.series.map((trace) => trace.name)).toEqual([
      'Emissions (forecast)',
      'Emissions',
    ]);
  });

  it('leaves sectors without data empty', () => {
    const transport = buildEmissionsPage(records, targets, makeContext()).sectorCards[2];
    expect(transport?.figure.series).toEqual([]);
  });

  it('sums every sector into the total graph', () => {
    const { totalCard } = buildEmissionsPage(records, targets, makeContext());

    expect(totalCard.id).toBe('emissions-total');
    expect(totalCard.title).toBe('Total emissions');
    expect(totalCard.figure.series.map((trace) => trace.name)).toEqual([
      'Building heating (forecast)',
      'Building heating',
      'Waste treatment (forecast)',
      'Waste treatment',
    ]);

    const heatingHistory = totalCard.figure.series[1];
    expect(heatingHistory?.data).toEqual([
      ['2018', 400],
      ['2019', 370],
    ]);
    expect(heatingHistory?.lineStyle.color).toBe('#e5702a');
  });

  it('summarises the target year against the goal', () => {
    const { summary } = buildEmissionsPage(records, targets, makeContext());

    expect(summary.goal).toBe(250);
    expect(summary.value).toBe(300);
    expect(summary.difference).toBe(50);
    expect(summary.isGood).toBe(false);
    expect(summary.unit).toBe('kt');
  });

  it('translates sector names and the forecast suffix', () => {
    const [heating] = buildEmissionsPage(records, targets, makeContext('fi-FI')).sectorCards;

    expect(heating?.title).toBe('Rakennusten lämmitys');
    expect(heating?.figure.series[0]?.name).toBe('Kaukolämpö (enn.)');
  });
});
