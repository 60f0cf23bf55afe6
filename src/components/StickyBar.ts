import { defineComponent, h, type PropType } from 'vue';
import { useI18n } from 'vue-i18n';
import { formatDifference, formatRounded } from 'src/utils/format';
import type { Summary } from 'src/utils/sectors';

/**
 * Summary bar comparing a forecast value with its goal
 */
export default defineComponent({
  name: 'StickyBar',
  props: {
    summary: { type: Object as PropType<Summary>, required: true },
    year: { type: Number, required: true },
  },
  setup(props) {
    const { t, locale } = useI18n();

    return () => {
      const { summary } = props;
      const amount = (value: string) => `${value} ${summary.unit}`;

      return h(
        'div',
        { class: ['sticky-bar', summary.isGood ? 'sticky-bar--good' : 'sticky-bar--bad'] },
        [
          h('div', { class: 'sticky-bar__label' }, summary.label),
          h('div', { class: 'sticky-bar__value' }, [
            h('span', t('summary.targetYear', { year: props.year })),
            h('strong', amount(formatRounded(summary.value, locale.value))),
          ]),
          h('div', { class: 'sticky-bar__goal' }, [
            h('span', t('summary.goal')),
            h('strong', amount(formatRounded(summary.goal, locale.value))),
          ]),
          h('div', { class: 'sticky-bar__difference' }, [
            h('span', t('summary.difference')),
            h('strong', amount(formatDifference(summary.difference, locale.value))),
          ]),
          h(
            'div',
            { class: 'sticky-bar__status' },
            summary.isGood ? t('summary.onTrack') : t('summary.offTrack'),
          ),
        ],
      );
    };
  },
});
