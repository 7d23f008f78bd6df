/**
 * Localized Message Catalog
 *
 * Loads the reply templates from locales/<locale>.json at the repository
 * root and renders them with named placeholders, e.g. "Budget: {budget}".
 * Both src/i18n and dist/i18n sit two levels below the root, so the same
 * relative URL works for tsx, vitest and the compiled build.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { LOCALES, type Locale } from './types.js';

export const MessageCatalogSchema = z.object({
  start: z.string(),
  helpPrompt: z.string(),
  helpMessage: z.string(),
  addUsage: z.string(),
  invalidAmount: z.string(),
  invalidPaymentMethod: z.string(),
  categoryNotFound: z.string(),
  errorOccurred: z.string(),
  expenseAdded: z.string(),
  paymentCard: z.string(),
  paymentCash: z.string(),
  dailyBudget: z.string(),
  languageSet: z.string(),
  selectLanguage: z.string(),
  unknownCommand: z.string(),
});

export type MessageCatalog = z.infer<typeof MessageCatalogSchema>;
export type MessageKey = keyof MessageCatalog;
export type Messages = Record<Locale, MessageCatalog>;

const DEFAULT_LOCALES_DIR = new URL('../../locales/', import.meta.url);

/**
 * Reads and validates every locale file. Throws ConfigurationError listing
 * each missing file or missing key.
 */
export function loadMessages(dir: URL = DEFAULT_LOCALES_DIR): Messages {
  const problems: string[] = [];
  const loaded: Partial<Messages> = {};

  for (const locale of LOCALES) {
    const file = new URL(`${locale}.json`, dir);
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(file, 'utf-8'));
    } catch (err) {
      problems.push(`${locale}.json unreadable: ${err instanceof Error ? err.message : String(err)}`);
      continue;
    }

    const parsed = MessageCatalogSchema.safeParse(raw);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        problems.push(`${locale}.json: ${issue.path.join('.')} ${issue.message}`);
      }
      continue;
    }
    loaded[locale] = parsed.data;
  }

  if (problems.length > 0 || !loaded.en || !loaded.ru) {
    throw new ConfigurationError(problems);
  }
  return { en: loaded.en, ru: loaded.ru };
}

/**
 * Replaces {name} placeholders with the given values.
 * Unknown placeholders are left as they are.
 */
export function formatMessage(template: string, params: Record<string, string | number> = {}): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) => {
    const value = params[name];
    return value === undefined ? match : String(value);
  });
}
