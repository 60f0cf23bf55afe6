import { defineComponent, h, resolveComponent } from 'vue';
import { useI18n } from 'vue-i18n';

export default defineComponent({
  name: 'ErrorNotFound',
  setup() {
    const { t } = useI18n();
    return () =>
      h('div', { class: 'error-not-found' }, [
        h('h2', t('pageNotFound')),
        h(resolveComponent('RouterLink'), { to: '/' }, { default: () => t('backToOverview') }),
      ]);
  },
});
