export default {
  // Common UI elements
  appTitle: 'Päästöennuste',
  loading: 'Ladataan...',
  retry: 'Yritä uudelleen',
  resetDefault: 'Palauta oletukset',
  pageNotFound: 'Sivua ei löytynyt',
  backToOverview: 'Takaisin yleiskatsaukseen',
  backendVersion: 'Mallin versio {version}',
  region: 'Alue',
  // Chart components
  loadingChartData: 'Ladataan kuvaajan tietoja...',
  noChartDataAvailable: 'Kuvaajalle ei ole tietoja',
  openSectorPage: 'Näytä tarkemmin',
  // Chart labels
  forecastSuffix: '(enn.)',
  // Emissions
  emissions: 'Päästöt',
  emissionsTotal: 'Päästöt yhteensä',
  summary: {
    goal: 'Tavoite',
    targetYear: 'Ennuste vuodelle {year}',
    difference: 'Ero tavoitteeseen',
    onTrack: 'Tavoitteessa',
    offTrack: 'Ei tavoitteessa',
  },
  // Consumer electricity
  electricity: {
    sliderLabel: 'Sähkönkulutuksen vuosimuutos asukasta kohti',
    perCapitaTitle: 'Sähkönkulutus asukasta kohti',
    perCapitaTrace: 'Sähkönkulutus/as.',
    consumptionTitle: 'Kulutussähkön kulutus',
    consumptionTrace: 'Sähkönkulutus',
    emissionsTitle: 'Kulutussähkön päästöt',
  },
};
