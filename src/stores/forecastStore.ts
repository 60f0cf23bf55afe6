import { defineStore } from 'pinia';
import { computed, ref, watch } from 'vue';
import type { AxiosResponse } from 'axios';
import { forecastService, type ApiResponse } from 'services/forecastService';
import { getCurrentRegion, setCurrentRegion } from 'src/utils/dashboardConfig';
import type { ElectricityRecord, EmissionRecord } from 'src/utils/forecastData';
import { describeRequestError } from 'src/utils/requestErrors';
import { ELECTRICITY_PAGE_ID } from 'src/pages/registry';
import { useVariablesStore } from './variablesStore';

type Dataset = 'emissions' | 'electricity';

export const useForecastStore = defineStore('forecast', () => {
  const variablesStore = useVariablesStore();

  // State
  const emissions = ref<EmissionRecord[] | null>(null);
  const electricity = ref<ElectricityRecord[] | null>(null);
  const backendVersion = ref<string | null>(null);
  const error = ref<string | null>(null);
  const currentPage = ref<string | null>(null);
  const pendingRequests = ref(0);

  // Getters
  const isLoading = computed(() => pendingRequests.value > 0);

  // Private variables (not exposed in the return)
  let debounceTimer: ReturnType<typeof setTimeout> | null = null;
  let lastRunTime = 0;
  const debounceDelay = 200;
  // Id of the newest request per dataset; responses of older ones are dropped
  const latestRequest: Record<Dataset, number> = { emissions: 0, electricity: 0 };

  async function request<T>(
    dataset: Dataset,
    fetch: () => Promise<AxiosResponse<ApiResponse<T>>>,
  ): Promise<T | null> {
    const requestId = ++latestRequest[dataset];
    const isCurrent = () => latestRequest[dataset] === requestId;

    pendingRequests.value++;
    error.value = null;
    try {
      const response = await fetch();
      if (!isCurrent()) return null;
      // Handle error status from API
      if (response.data.status === 'error') {
        error.value = response.data.message || 'An error occurred fetching forecast data';
        return null;
      }
      return response.data.data;
    } catch (err) {
      console.error(`Error fetching ${dataset} forecast:`, err);
      if (isCurrent()) error.value = describeRequestError(err);
      throw err;
    } finally {
      pendingRequests.value--;
    }
  }

  async function loadEmissions() {
    const data = await request('emissions', () =>
      forecastService.getEmissionsForecast(getCurrentRegion()),
    );
    if (data) emissions.value = data;
    return data;
  }

  async function loadElectricity() {
    const adjustment = variablesStore.getVariable('electricity_consumption_per_capita_adjustment');
    const data = await request('electricity', () =>
      forecastService.getElectricityForecast(adjustment, getCurrentRegion()),
    );
    if (data) electricity.value = data;
    return data;
  }

  // The version is shown in the footer only, its failures never block the charts
  async function loadVersion(): Promise<void> {
    try {
      const response = await forecastService.getVersion();
      if (response.data.status === 'success') {
        backendVersion.value = response.data.data.version;
      } else {
        console.warn('Model version unavailable:', response.data.message);
      }
    } catch (err) {
      console.warn('Could not load model version:', err);
    }
  }

  function debouncedLoadElectricity() {
    if (debounceTimer) clearTimeout(debounceTimer);

    const now = Date.now();
    // A slider drag fires many changes; only the last one inside the delay is fetched
    if (now - lastRunTime < debounceDelay) {
      debounceTimer = setTimeout(() => {
        lastRunTime = Date.now();
        debounceTimer = null;
        loadElectricity().catch((err) => console.error('Electricity reload failed:', err));
      }, debounceDelay);
    } else {
      lastRunTime = now;
      loadElectricity().catch((err) => console.error('Electricity reload failed:', err));
    }
  }

  function loadPageData(pageId: string | null) {
    if (pageId === ELECTRICITY_PAGE_ID) {
      return loadElectricity();
    }
    if (pageId !== null) {
      return loadEmissions();
    }
    return Promise.resolve(null);
  }

  // Watchers
  watch(
    () => variablesStore.getVariable('electricity_consumption_per_capita_adjustment'),
    () => {
      if (currentPage.value === ELECTRICITY_PAGE_ID) {
        debouncedLoadElectricity();
      }
    },
  );

  // Store interface
  return {
    // State
    emissions,
    electricity,
    backendVersion,
    isLoading,
    error,
    currentPage,

    // Actions
    loadEmissions,
    loadElectricity,
    loadVersion,
    setCurrentPage: (pageId: string | null) => {
      currentPage.value = pageId;
      loadPageData(pageId).catch((err) => console.error(`Loading data for ${pageId} failed:`, err));
    },
    setRegion: (region: string) => {
      if (!setCurrentRegion(region)) return false;
      loadPageData(currentPage.value).catch((err) =>
        console.error(`Loading data for region ${region} failed:`, err),
      );
      return true;
    },
  };
});
