import { computed, defineComponent, h } from 'vue';
import { useI18n } from 'vue-i18n';
import GraphCard from 'components/GraphCard';
import StickyBar from 'components/StickyBar';
import { useCurrentPage } from 'src/composables/useCurrentPage';
import { useForecastStore } from 'stores/forecastStore';
import { useVariablesStore } from 'stores/variablesStore';
import { EMISSIONS_PAGE_ID } from 'src/pages/registry';
import { buildEmissionsPage, type EmissionsPageModel } from 'src/pages/emissionsPage';

type PageState = { model: EmissionsPageModel } | { error: string } | null;

export default defineComponent({
  name: 'EmissionsTab',
  setup() {
    const { t, locale } = useI18n();
    const forecastStore = useForecastStore();
    const variablesStore = useVariablesStore();
    useCurrentPage(EMISSIONS_PAGE_ID);

    const targetYear = computed(() => variablesStore.getVariable('target_year'));

    const page = computed<PageState>(() => {
      const records = forecastStore.emissions;
      if (!records) return null;
      try {
        const model = buildEmissionsPage(
          records,
          {
            targetYear: targetYear.value,
            referenceYear: variablesStore.getVariable('ghg_reductions_reference_year'),
            reductionPercentage: variablesStore.getVariable(
              'ghg_reductions_percentage_in_target_year',
            ),
          },
          { locale: locale.value, t: (key: string) => t(key) },
        );
        return { model };
      } catch (err) {
        console.error('Building emissions charts failed:', err);
        return { error: err instanceof Error ? err.message : String(err) };
      }
    });

    const retry = () => {
      forecastStore.loadEmissions().catch((err) => console.error('Retry failed:', err));
    };

    return () => {
      const buildError = page.value && 'error' in page.value ? page.value.error : null;
      const error = forecastStore.error ?? buildError;
      if (error) {
        return h('div', { class: 'dashboard-error' }, [
          h('p', error),
          h('button', { type: 'button', onClick: retry }, t('retry')),
        ]);
      }
      if (!page.value || !('model' in page.value)) {
        return h('div', { class: 'dashboard-loading' }, t('loading'));
      }

      const { model } = page.value;
      return h('div', { class: 'emissions-tab' }, [
        h(
          'div',
          { class: 'dashboard-row' },
          model.sectorCards.map((card) =>
            h('div', { class: 'dashboard-col dashboard-col--half', key: card.id }, [
              h(GraphCard, {
                id: card.id,
                title: card.title,
                figure: card.figure,
                linkTo: card.linkTo,
              }),
            ]),
          ),
        ),
        h('div', { class: 'dashboard-row' }, [
          h(GraphCard, {
            id: model.totalCard.id,
            title: model.totalCard.title,
            figure: model.totalCard.figure,
          }),
        ]),
        h(StickyBar, { summary: model.summary, year: targetYear.value }),
      ]);
    };
  },
});
