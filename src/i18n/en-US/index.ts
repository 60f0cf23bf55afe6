export default {
  // Common UI elements
  appTitle: 'Emissions forecast',
  loading: 'Loading...',
  retry: 'Retry',
  resetDefault: 'Reset to Default',
  pageNotFound: 'Page not found',
  backToOverview: 'Back to Overview',
  backendVersion: 'Model version {version}',
  region: 'Region',
  // Chart components
  loadingChartData: 'Loading chart data...',
  noChartDataAvailable: 'No chart data available',
  openSectorPage: 'Show details',
  // Chart labels
  forecastSuffix: '(forecast)',
  // Emissions
  emissions: 'Emissions',
  emissionsTotal: 'Total emissions',
  summary: {
    goal: 'Goal',
    targetYear: 'Forecast for {year}',
    difference: 'Difference to goal',
    onTrack: 'On track',
    offTrack: 'Off track',
  },
  // Consumer electricity
  electricity: {
    sliderLabel: 'Yearly change in electricity use per capita',
    perCapitaTitle: 'Electricity consumption per capita',
    perCapitaTrace: 'Consumption/cap.',
    consumptionTitle: 'Consumer electricity consumption',
    consumptionTrace: 'Electricity consumption',
    emissionsTitle: 'Consumer electricity emissions',
  },
};
