/** Languages the bot replies in */
export type Locale = 'en' | 'ru';

export const LOCALES: readonly Locale[] = ['en', 'ru'];

export function isLocale(value: string): value is Locale {
  return LOCALES.some(locale => locale === value);
}
