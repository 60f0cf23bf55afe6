import { createI18n } from 'vue-i18n';
import messages from 'src/i18n';

export const DEFAULT_LOCALE = 'en-US';

export function createDashboardI18n(locale = DEFAULT_LOCALE) {
  return createI18n({
    legacy: false,
    locale,
    fallbackLocale: DEFAULT_LOCALE,
    messages,
  });
}
