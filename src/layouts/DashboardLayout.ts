import { defineComponent, h, onMounted, resolveComponent, type VNode } from 'vue';
import { useI18n } from 'vue-i18n';
import { useSectorNavigation } from 'src/composables/useSectorNavigation';
import { getAvailableRegions, getCurrentRegion } from 'src/utils/dashboardConfig';
import { useForecastStore } from 'stores/forecastStore';

export default defineComponent({
  name: 'DashboardLayout',
  setup() {
    const { t } = useI18n();
    const { navigationEntries } = useSectorNavigation();
    const forecastStore = useForecastStore();

    onMounted(() => {
      void forecastStore.loadVersion();
    });

    // Only offered when the backend models more than one region
    function renderRegionSelect(): VNode | null {
      const regions = getAvailableRegions();
      if (regions.length < 2) return null;
      return h('label', { class: 'dashboard-region' }, [
        t('region'),
        h(
          'select',
          {
            value: getCurrentRegion(),
            onChange: (event: Event) => {
              if (event.target instanceof HTMLSelectElement) {
                forecastStore.setRegion(event.target.value);
              }
            },
          },
          regions.map((region) => h('option', { key: region, value: region }, region)),
        ),
      ]);
    }

    return () =>
      h('div', { class: 'dashboard-layout' }, [
        h('header', { class: 'dashboard-header' }, [
          h('h1', t('appTitle')),
          h(
            'nav',
            { class: 'dashboard-nav' },
            navigationEntries.value.map((entry) =>
              h(
                resolveComponent('RouterLink'),
                { key: entry.id, to: entry.path },
                { default: () => entry.label },
              ),
            ),
          ),
          renderRegionSelect(),
        ]),
        h('main', { class: 'dashboard-content' }, [h(resolveComponent('RouterView'))]),
        forecastStore.backendVersion
          ? h(
              'footer',
              { class: 'dashboard-footer' },
              t('backendVersion', { version: forecastStore.backendVersion }),
            )
          : null,
      ]);
  },
});
