import { ref } from 'vue';
import axios from 'axios';

interface DashboardConfigResponse {
  status: string;
  region: string;
  available_regions: string[];
}

const DEFAULT_REGION = 'Helsinki';

// Region whose forecast is shown, and the regions the backend can model
const region = ref(DEFAULT_REGION);
const availableRegions = ref<string[]>([DEFAULT_REGION]);
let pending: Promise<void> | null = null;
let loaded = false;

async function fetchDashboardConfig(): Promise<void> {
  try {
    const { data } = await axios.get<DashboardConfigResponse>('/api/dashboard-config');
    if (data.status !== 'success') {
      console.warn(`Dashboard config request returned status "${data.status}", using defaults`);
      return;
    }
    availableRegions.value = data.available_regions.length
      ? data.available_regions
      : [data.region];
    region.value = data.region;
    loaded = true;
  } catch (error) {
    console.warn('Failed to load dashboard config from backend, using defaults:', error);
  }
}

/**
 * Fetch the runtime configuration once; concurrent callers share the request.
 * A failed load keeps the defaults and is retried on the next call.
 */
export function loadDashboardConfig(): Promise<void> {
  if (loaded) return Promise.resolve();
  if (!pending) {
    pending = fetchDashboardConfig().finally(() => {
      pending = null;
    });
  }
  return pending;
}

export const getCurrentRegion = (): string => region.value;
export const getAvailableRegions = (): string[] => availableRegions.value;

/**
 * Switch to another region offered by the backend
 */
export function setCurrentRegion(next: string): boolean {
  if (!availableRegions.value.includes(next)) {
    console.error(`Region "${next}" is not available`);
    return false;
  }
  region.value = next;
  return true;
}
