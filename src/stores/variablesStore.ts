import { defineStore } from 'pinia';
import { computed, ref } from 'vue';
import { findVariable, variables as variableDefinitions } from 'utils/variables';
import type { Variable, VariableCode } from 'utils/variables';

function isValidVariableValue(variable: Variable, value: number): boolean {
  if (!Number.isFinite(value) || value < variable.min || value > variable.max) {
    console.error(`Value ${value} out of range for variable ${variable.code}`);
    return false;
  }
  return true;
}

export const useVariablesStore = defineStore('variables', () => {
  // State
  const values = ref<Record<string, number>>({});

  const getVariable = (code: VariableCode): number => {
    const variable = findVariable(code);
    if (!variable) {
      throw new Error(`Unknown variable "${code}"`);
    }
    return values.value[code] ?? variable.default;
  };

  const isModified = computed(() =>
    variableDefinitions.some(
      (v) => values.value[v.code] !== undefined && values.value[v.code] !== v.default,
    ),
  );

  // Actions
  function setVariable(code: VariableCode, value: number): boolean {
    const variable = findVariable(code);
    if (!variable) {
      console.error(`Variable "${code}" not found`);
      return false;
    }
    if (!isValidVariableValue(variable, value)) return false;

    values.value[code] = value;
    return true;
  }

  function batchUpdateVariables(updates: Partial<Record<VariableCode, number>>) {
    // Create a new object combining current state with updates
    const newValues = { ...values.value };

    Object.entries(updates).forEach(([code, value]) => {
      const variable = findVariable(code);
      if (variable && value !== undefined && isValidVariableValue(variable, value)) {
        newValues[code] = value;
      }
    });

    // Update the state in a single operation
    values.value = newValues;
  }

  function resetToDefaults() {
    values.value = {};
  }

  return {
    // State
    values,

    // Getters
    getVariable,
    isModified,

    // Actions
    setVariable,
    batchUpdateVariables,
    resetToDefaults,
  };
});
