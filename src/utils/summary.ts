import { totalForYear, type EmissionRecord } from './forecastData';
import type { Summary, SummaryData } from './sectors';

export function summarize(data: SummaryData): Summary {
  const difference = data.value - data.goal;
  return {
    ...data,
    difference,
    isGood: data.belowGoalGood ? data.value <= data.goal : data.value >= data.goal,
  };
}

export interface EmissionsSummaryInput {
  records: EmissionRecord[];
  targetYear: number;
  referenceYear: number;
  reductionPercentage: number;
  label: string;
  unit: string;
}

/**
 * Target-year emissions against the goal derived from the reference year
 */
export function buildEmissionsSummary(input: EmissionsSummaryInput): Summary {
  const referenceEmissions = totalForYear(input.records, input.referenceYear);
  const goal = referenceEmissions * (1 - input.reductionPercentage / 100);

  return summarize({
    label: input.label,
    goal,
    value: totalForYear(input.records, input.targetYear),
    unit: input.unit,
    belowGoalGood: true,
  });
}
