import { defineComponent, h } from 'vue';

export const VChartStub = defineComponent({
  name: 'VChartStub',
  props: {
    option: { type: Object, required: true },
  },
  setup() {
    return () => h('div', { class: 'v-chart-stub' });
  },
});

export const RouterLinkStub = defineComponent({
  name: 'RouterLinkStub',
  props: {
    to: { type: String, required: true },
  },
  setup(props, { slots }) {
    return () => h('a', { href: props.to }, slots.default?.());
  },
});
