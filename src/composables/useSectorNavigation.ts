import { computed } from 'vue';
import { useI18n } from 'vue-i18n';
import { dashboardPages } from 'src/pages/registry';
import { getTranslatedText } from 'src/utils/translationHelpers';

export interface NavigationEntry {
  id: string;
  label: string;
  path: string;
}

export function useSectorNavigation() {
  const { locale } = useI18n();

  const navigationEntries = computed<NavigationEntry[]>(() =>
    dashboardPages.map((page) => ({
      id: page.id,
      label: getTranslatedText(page.name, locale.value),
      path: page.path,
    })),
  );

  return {
    navigationEntries,
  };
}
