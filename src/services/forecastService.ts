import axios from 'axios';
import type { ElectricityRecord, EmissionRecord } from 'src/utils/forecastData';

export type ApiResponse<T> =
  | { status: 'success'; data: T }
  | { status: 'error'; message?: string };

// Create an axios instance with base configuration
const apiClient = axios.create({
  baseURL: '/api',
  headers: {
    'Content-Type': 'application/json',
  },
});

export const forecastService = {
  /**
   * Historical and forecast emissions of every sector and sub-sector
   * @param region - Region to get data for (optional, backend default otherwise)
   */
  getEmissionsForecast(region?: string) {
    const params: Record<string, string> = {};
    if (region) params.region = region;

    return apiClient.get<ApiResponse<EmissionRecord[]>>('/v1/emissions-forecast', { params });
  },

  /**
   * Consumer electricity forecast
   * @param perCapitaAdjustment - Yearly change of per-capita consumption, in percent
   * @param region - Region to get data for (optional)
   */
  getElectricityForecast(perCapitaAdjustment: number, region?: string) {
    const params: Record<string, string | number> = { per_capita_adjustment: perCapitaAdjustment };
    if (region) params.region = region;

    return apiClient.get<ApiResponse<ElectricityRecord[]>>('/v1/electricity-forecast', {
      params,
    });
  },

  getVersion() {
    return apiClient.get<ApiResponse<{ version: string }>>('/v1/version');
  },
};
