/**
 * Cell Lock
 *
 * Serializes read-modify-write cycles per cell reference. Appending a term
 * reads the formula, extends it and writes it back; two appends to the
 * same cell running interleaved would both read the same "before" text and
 * the later write would drop the earlier term.
 *
 * KeyedMutex only covers one process. Writers elsewhere (another bot
 * instance, a person editing the sheet) can still interleave.
 */

export interface CellLock {
  runExclusive<T>(cell: string, task: () => Promise<T>): Promise<T>;
}

export class KeyedMutex implements CellLock {
  private readonly tails = new Map<string, Promise<void>>();

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    const settle = (): void => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    };
    const tail: Promise<void> = result.then(settle, settle);
    this.tails.set(key, tail);

    return result;
  }

  /** Number of keys with queued or running tasks */
  get pendingKeys(): number {
    return this.tails.size;
  }
}
