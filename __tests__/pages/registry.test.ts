import { describe, expect, it } from 'vitest';
import { ELECTRICITY_PAGE_ID, getPageForEmissionSector } from 'src/pages/registry';

describe('page registry', () => {
  it('finds the page of an emission sector', () => {
    expect(getPageForEmissionSector('ElectricityConsumption')?.id).toBe(ELECTRICITY_PAGE_ID);
    expect(getPageForEmissionSector('Waste')).toBeUndefined();
  });

  it('falls back to the main sector page for sub-sectors', () => {
    expect(getPageForEmissionSector('ElectricityConsumption', 'Households')?.id).toBe(
      ELECTRICITY_PAGE_ID,
    );
  });
});
