/**
 * Type for translation objects in JSON configs
 */
export interface TranslationObject {
  enUS: string;
  fiFI: string;
}

export type Translatable = string | TranslationObject;

/**
 * Type guard to check if a value is a TranslationObject
 */
export function isTranslationObject(value: unknown): value is TranslationObject {
  return typeof value === 'object' && value !== null && 'enUS' in value && 'fiFI' in value;
}

/**
 * Get translated text from either a string or a TranslationObject
 * @param value - Either a string or a TranslationObject
 * @param locale - Current locale string (e.g., 'fi-FI')
 * @param fallback - Optional fallback text if translation not found
 * @returns Translated text
 */
export function getTranslatedText(value: Translatable, locale: string, fallback = ''): string {
  // If it's already a string, return it
  if (typeof value === 'string') {
    return value;
  }

  if (isTranslationObject(value)) {
    // Map locale format (e.g., 'fi-FI' to 'fiFI')
    const localeKey = locale.replace(/-/g, '');

    if (localeKey === 'fiFI' && value.fiFI) {
      return value.fiFI;
    }

    // Fallback to enUS, then to fallback parameter
    return value.enUS || fallback;
  }

  return fallback;
}
