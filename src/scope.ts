/**
 * ConfigScope: typed option storage with parent fallback and named sub-scopes.
 *
 * Lookups (`get`, `exists`, `getOrDefault`, `isDefault`) consult this scope's
 * own store first and then walk up the parent chain. Writes (`set`, `getRef`)
 * only ever touch this scope's own store.
 */

import {
  DuplicateSubscopeError,
  KeyNotFoundError,
  SubscopeNotFoundError,
  UnrecognizedOptionError,
  ValueTypeError,
} from './errors.js';
import { describeKey, resolveKey, type OptionKey } from './option-id.js';
import { parseInto, type ParseOptions } from './parser/scope-parser.js';
import { TypedStore } from './store/typed-store.js';
import {
  KIND_NAMES,
  VALUE_KINDS,
  ZERO_VALUES,
  isValueOf,
  type ValueKind,
  type ValueOf,
  type ValueTypes,
} from './store/value-kinds.js';

/**
 * Read-only view of a scope. Parent links and `getSubscope` hand out this
 * view so that lookups can never write into another scope.
 */
export interface ScopeReader {
  readonly parent: ScopeReader | null;
  get<K extends ValueKind>(kind: K, key: OptionKey): ValueOf<K>;
  exists<K extends ValueKind>(kind: K, key: OptionKey): boolean;
  getOrDefault<K extends ValueKind>(kind: K, key: OptionKey, defaultValue: ValueOf<K>): ValueOf<K>;
  isDefault<K extends ValueKind>(kind: K, key: OptionKey): boolean;
  getSubscope(name: string): ScopeReader;
  hasSubscope(name: string): boolean;
  listSubscopes(): string[];
  checkAllRead(pathLabel?: string): void;
}

/** Live handle on a value slot, as returned by `ConfigScope.getRef`. */
export interface ValueRef<T> {
  value: T;
}

type StoreTable = { [K in keyof ValueTypes]: TypedStore<ValueTypes[K]> };

export class ConfigScope implements ScopeReader {
  private readonly _parent: ScopeReader | null;
  private readonly _stores: StoreTable = {
    bool: new TypedStore<boolean>(),
    int: new TypedStore<number>(),
    float: new TypedStore<number>(),
    string: new TypedStore<string>(),
  };
  private readonly _children: Map<string, ConfigScope> = new Map();

  constructor(parent?: ScopeReader | null) {
    this._parent = parent ?? null;
  }

  get parent(): ScopeReader | null {
    return this._parent;
  }

  private _store<K extends ValueKind>(kind: K): TypedStore<ValueOf<K>> {
    return this._stores[kind];
  }

  get<K extends ValueKind>(kind: K, key: OptionKey): ValueOf<K> {
    const k = resolveKey(key);
    const entry = this._store(kind).find(k);
    if (entry !== undefined) return entry.get();
    if (this._parent !== null) return this._parent.get(kind, k);
    throw new KeyNotFoundError(describeKey(k));
  }

  exists<K extends ValueKind>(kind: K, key: OptionKey): boolean {
    const k = resolveKey(key);
    if (this._store(kind).has(k)) return true;
    if (this._parent === null) return false;
    return this._parent.exists(kind, k);
  }

  getOrDefault<K extends ValueKind>(kind: K, key: OptionKey, defaultValue: ValueOf<K>): ValueOf<K> {
    const k = resolveKey(key);
    const entry = this._store(kind).find(k);
    if (entry !== undefined) return entry.get();
    if (this._parent !== null) return this._parent.getOrDefault(kind, k, defaultValue);
    return defaultValue;
  }

  set<K extends ValueKind>(kind: K, key: OptionKey, value: ValueOf<K>): void {
    const k = resolveKey(key);
    this._assertKind(kind, k, value);
    this._store(kind).set(k, value);
  }

  /**
   * Returns a handle on this scope's own slot for `key`, creating it with the
   * kind's zero value when absent. The slot is marked read. Assigning through
   * the handle does not reset the read flag.
   */
  getRef<K extends ValueKind>(kind: K, key: OptionKey): ValueRef<ValueOf<K>> {
    const k = resolveKey(key);
    const entry = this._store(kind).slot(k, ZERO_VALUES[kind]);
    entry.get();
    const assertKind = (value: unknown): void => {
      this._assertKind(kind, k, value);
    };
    return {
      get value(): ValueOf<K> {
        return entry.peek();
      },
      set value(v: ValueOf<K>) {
        assertKind(v);
        entry.assign(v);
      },
    };
  }

  /**
   * True when the key is not overridden anywhere below the root. The root
   * itself always reports true.
   */
  isDefault<K extends ValueKind>(kind: K, key: OptionKey): boolean {
    if (this._parent === null) return true;
    const k = resolveKey(key);
    if (this._store(kind).has(k)) return false;
    return this._parent.isDefault(kind, k);
  }

  addSubscope(name: string): ConfigScope {
    if (this._children.has(name)) {
      throw new DuplicateSubscopeError(name);
    }
    const child = new ConfigScope(this);
    this._children.set(name, child);
    return child;
  }

  getSubscope(name: string): ScopeReader {
    return this.getMutableSubscope(name);
  }

  getMutableSubscope(name: string): ConfigScope {
    const child = this._children.get(name);
    if (child === undefined) {
      throw new SubscopeNotFoundError(name);
    }
    return child;
  }

  hasSubscope(name: string): boolean {
    return this._children.has(name);
  }

  listSubscopes(): string[] {
    return [...this._children.keys()].sort();
  }

  /**
   * Parses `text` into this scope: plain assignments land here, parenthesized
   * groups become sub-scopes.
   */
  addSubscopeFromString(text: string, options?: ParseOptions): void {
    parseInto(this, text, options);
  }

  /**
   * Throws for the first own option that was never read. Sub-scopes are not
   * visited; see `checkTreeAllRead` for a whole-tree pass.
   */
  checkAllRead(pathLabel: string = ''): void {
    for (const kind of VALUE_KINDS) {
      const unread = this._store(kind).findUnread();
      if (unread !== undefined) {
        throw new UnrecognizedOptionError(KIND_NAMES[kind], pathLabel + describeKey(unread));
      }
    }
  }

  private _assertKind<K extends ValueKind>(kind: K, key: string, value: unknown): asserts value is ValueOf<K> {
    if (!isValueOf(kind, value)) {
      throw new ValueTypeError(describeKey(key), KIND_NAMES[kind], value);
    }
  }
}

export function createScope(parent?: ScopeReader | null): ConfigScope {
  return new ConfigScope(parent);
}
