import { defineComponent, h, resolveComponent, type PropType, type VNode } from 'vue';
import { useI18n } from 'vue-i18n';
import { CHART_HEIGHT } from 'src/utils/chartLayout';
import type { ForecastFigure } from 'src/utils/predictionGraph';
import type { SliderConfig } from 'src/utils/sliders';

/**
 * Card with one forecast graph, an optional slider above it and an optional
 * link to the page that explains the graph's sector.
 */
export default defineComponent({
  name: 'GraphCard',
  props: {
    id: { type: String, required: true },
    title: { type: String, default: '' },
    figure: { type: Object as PropType<ForecastFigure | null>, default: null },
    linkTo: { type: String as PropType<string | null>, default: null },
    slider: { type: Object as PropType<SliderConfig | null>, default: null },
    sliderLabel: { type: String, default: '' },
    loading: { type: Boolean, default: false },
  },
  emits: {
    'update:slider': (value: number) => Number.isFinite(value),
  },
  setup(props, { emit }) {
    const { t } = useI18n();

    function renderSlider(slider: SliderConfig): VNode {
      const marks = Object.entries(slider.marks).sort(([a], [b]) => Number(a) - Number(b));
      return h('div', { class: 'graph-card__slider' }, [
        h('input', {
          id: `${props.id}-slider`,
          type: 'range',
          min: slider.min,
          max: slider.max,
          step: slider.step,
          value: slider.value,
          'aria-label': props.sliderLabel,
          onChange: (event: Event) => {
            if (event.target instanceof HTMLInputElement) {
              emit('update:slider', Number(event.target.value));
            }
          },
        }),
        h(
          'div',
          { class: 'graph-card__marks' },
          marks.map(([value, label]) => h('span', { key: value, 'data-value': value }, label)),
        ),
      ]);
    }

    function renderBody(): VNode {
      if (props.loading) {
        return h('div', { class: 'graph-card__status' }, t('loadingChartData'));
      }
      if (!props.figure || props.figure.series.length === 0) {
        return h('div', { class: 'graph-card__status' }, t('noChartDataAvailable'));
      }
      return h(resolveComponent('v-chart'), {
        id: `${props.id}-graph`,
        option: props.figure,
        autoresize: true,
        style: { height: `${CHART_HEIGHT}px` },
      });
    }

    return () => {
      const children: VNode[] = [];
      if (props.title) children.push(h('h3', { class: 'graph-card__title' }, props.title));
      if (props.slider) children.push(renderSlider(props.slider));
      children.push(renderBody());
      if (props.linkTo) {
        children.push(
          h(
            resolveComponent('RouterLink'),
            { to: props.linkTo, class: 'graph-card__link' },
            { default: () => t('openSectorPage') },
          ),
        );
      }
      return h('div', { id: props.id, class: 'graph-card' }, children);
    };
  },
});
