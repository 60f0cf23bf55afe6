import { computed, defineComponent, h } from 'vue';
import { useI18n } from 'vue-i18n';
import GraphCard from 'components/GraphCard';
import { useCurrentPage } from 'src/composables/useCurrentPage';
import { useForecastStore } from 'stores/forecastStore';
import { useVariablesStore } from 'stores/variablesStore';
import { ELECTRICITY_PAGE_ID } from 'src/pages/registry';
import {
  buildElectricityPage,
  buildPerCapitaSlider,
  sliderValueToAdjustment,
} from 'src/pages/electricityPage';
import type { SectorCard } from 'src/pages/emissionsPage';

const ADJUSTMENT = 'electricity_consumption_per_capita_adjustment';

export default defineComponent({
  name: 'ElectricityTab',
  setup() {
    const { t, locale } = useI18n();
    const forecastStore = useForecastStore();
    const variablesStore = useVariablesStore();
    useCurrentPage(ELECTRICITY_PAGE_ID);

    const slider = computed(() => buildPerCapitaSlider(variablesStore.getVariable(ADJUSTMENT)));

    const page = computed(() =>
      buildElectricityPage(forecastStore.electricity ?? [], {
        locale: locale.value,
        t: (key: string) => t(key),
      }),
    );

    const onSlider = (value: number) => {
      // The forecast store reloads the electricity data when the variable changes
      variablesStore.setVariable(ADJUSTMENT, sliderValueToAdjustment(value));
    };

    const resetVariables = () => {
      variablesStore.resetToDefaults();
    };

    return () => {
      const loading = forecastStore.isLoading && !forecastStore.electricity;
      const { perCapitaCard, consumptionCard, emissionsCard } = page.value;
      const card = ({ id, title, figure }: SectorCard) => ({ id, title, figure, loading });

      return h('div', { class: 'electricity-tab' }, [
        forecastStore.error ? h('div', { class: 'dashboard-error' }, forecastStore.error) : null,
        h('div', { class: 'dashboard-row' }, [
          h(GraphCard, {
            ...card(perCapitaCard),
            slider: slider.value,
            sliderLabel: t('electricity.sliderLabel'),
            'onUpdate:slider': onSlider,
          }),
          h(
            'button',
            {
              type: 'button',
              class: 'dashboard-reset',
              disabled: !variablesStore.isModified,
              onClick: resetVariables,
            },
            t('resetDefault'),
          ),
        ]),
        h('div', { class: 'dashboard-row' }, [h(GraphCard, card(consumptionCard))]),
        h('div', { class: 'dashboard-row' }, [h(GraphCard, card(emissionsCard))]),
      ]);
    };
  },
});
