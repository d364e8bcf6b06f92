/**
 * Identity-compared option keys.
 *
 * Define each OptionId once at module level and pass it wherever a string
 * key is accepted. Two OptionIds never share storage, even when their flags
 * and display names are identical.
 */

import { InvalidOptionIdError } from './errors.js';

let nextId = 1;
const registered = new Map<string, OptionId>();

export interface OptionIdInit {
  longFlag: string;
  displayName: string;
  helpText: string;
  shortFlag?: string;
}

export class OptionId {
  readonly id: number;
  readonly longFlag: string;
  readonly displayName: string;
  readonly helpText: string;
  readonly shortFlag: string | null;

  constructor(init: OptionIdInit) {
    if (!init.longFlag) {
      throw new InvalidOptionIdError('OptionId requires a non-empty longFlag');
    }
    if (init.shortFlag !== undefined && [...init.shortFlag].length !== 1) {
      throw new InvalidOptionIdError(
        `shortFlag for --${init.longFlag} must be a single character, got '${init.shortFlag}'`,
      );
    }
    this.id = nextId++;
    this.longFlag = init.longFlag;
    this.displayName = init.displayName;
    this.helpText = init.helpText;
    this.shortFlag = init.shortFlag ?? null;
    registered.set(this.storageKey, this);
    Object.freeze(this);
  }

  /** Key under which values for this option live in a scope's stores. */
  get storageKey(): string {
    return `\u0000option-id:${this.id}`;
  }

  equals(other: OptionId): boolean {
    return this === other;
  }

  toString(): string {
    return `--${this.longFlag}`;
  }
}

export type OptionKey = string | OptionId;

export function resolveKey(key: OptionKey): string {
  return typeof key === 'string' ? key : key.storageKey;
}

/** Looks up the OptionId a storage key was derived from. */
export function optionIdForKey(storageKey: string): OptionId | undefined {
  return registered.get(storageKey);
}

/** Human-readable form of a storage key: `--flag` for OptionIds, else the key itself. */
export function describeKey(storageKey: string): string {
  return registered.get(storageKey)?.toString() ?? storageKey;
}
