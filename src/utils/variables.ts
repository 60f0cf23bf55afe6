import type { TranslationObject } from './translationHelpers';
import variablesJSON from 'src/config/variables.json';

export interface Variable {
  code: string;
  title: string | TranslationObject;
  default: number;
  min: number;
  max: number;
}

export const variables: Variable[] = variablesJSON;

export type VariableCode =
  | 'target_year'
  | 'ghg_reductions_reference_year'
  | 'ghg_reductions_percentage_in_target_year'
  | 'electricity_consumption_per_capita_adjustment';

export function findVariable(code: string): Variable | undefined {
  return variables.find((v) => v.code === code);
}
