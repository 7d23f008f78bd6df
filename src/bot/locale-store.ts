/**
 * Locale Store
 *
 * Per-user reply language. Injected into the dispatcher so a persistent
 * store can replace the in-memory one without touching command handling.
 */

import type { Locale } from '../i18n/types.js';

export interface LocaleStore {
  get(userId: number): Locale | undefined;
  set(userId: number, locale: Locale): void;
}

/**
 * Keeps preferences for the life of the process; a restart forgets them.
 * Node runs handlers on one thread, so writers on different users never
 * interfere.
 */
export class InMemoryLocaleStore implements LocaleStore {
  private readonly preferences = new Map<number, Locale>();

  get(userId: number): Locale | undefined {
    return this.preferences.get(userId);
  }

  set(userId: number, locale: Locale): void {
    this.preferences.set(userId, locale);
  }
}
