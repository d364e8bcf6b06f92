/**
 * Per-kind key/value storage with read tracking.
 */

import { KeyNotFoundError } from '../errors.js';

export class StoreEntry<T> {
  private _value: T;
  private _read = false;

  constructor(value: T) {
    this._value = value;
  }

  /** Returns the value and marks the entry as read. */
  get(): T {
    this._read = true;
    return this._value;
  }

  /** Replaces the value; the entry counts as unread until the next get(). */
  set(value: T): void {
    this._read = false;
    this._value = value;
  }

  /** Replaces the value without touching the read flag. */
  assign(value: T): void {
    this._value = value;
  }

  /** Returns the value without marking the entry as read. */
  peek(): T {
    return this._value;
  }

  get isRead(): boolean {
    return this._read;
  }
}

export class TypedStore<T> {
  private _entries: Map<string, StoreEntry<T>> = new Map();

  get size(): number {
    return this._entries.size;
  }

  has(key: string): boolean {
    return this._entries.has(key);
  }

  find(key: string): StoreEntry<T> | undefined {
    return this._entries.get(key);
  }

  get(key: string): T {
    const entry = this._entries.get(key);
    if (entry === undefined) {
      throw new KeyNotFoundError(key);
    }
    return entry.get();
  }

  set(key: string, value: T): void {
    const entry = this._entries.get(key);
    if (entry === undefined) {
      this._entries.set(key, new StoreEntry(value));
    } else {
      entry.set(value);
    }
  }

  /** Returns the entry for `key`, creating it with `zero` when absent. */
  slot(key: string, zero: T): StoreEntry<T> {
    let entry = this._entries.get(key);
    if (entry === undefined) {
      entry = new StoreEntry(zero);
      this._entries.set(key, entry);
    }
    return entry;
  }

  isRead(key: string): boolean {
    return this._entries.get(key)?.isRead ?? false;
  }

  findUnread(): string | undefined {
    for (const [key, entry] of this._entries) {
      if (!entry.isRead) return key;
    }
    return undefined;
  }

  keys(): string[] {
    return [...this._entries.keys()];
  }
}
