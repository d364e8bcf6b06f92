import { describe, it, expect } from 'vitest';
import { StoreEntry, TypedStore } from '../../src/store/typed-store.js';
import { KeyNotFoundError } from '../../src/errors.js';
import { isValueOf } from '../../src/store/value-kinds.js';

describe('StoreEntry', () => {
  it('starts unread and becomes read on get', () => {
    const entry = new StoreEntry(5);
    expect(entry.isRead).toBe(false);
    expect(entry.get()).toBe(5);
    expect(entry.isRead).toBe(true);
  });

  it('set resets the read flag', () => {
    const entry = new StoreEntry('a');
    entry.get();
    entry.set('b');
    expect(entry.isRead).toBe(false);
    expect(entry.peek()).toBe('b');
  });

  it('assign and peek leave the read flag alone', () => {
    const entry = new StoreEntry(1);
    entry.assign(2);
    expect(entry.peek()).toBe(2);
    expect(entry.isRead).toBe(false);
    entry.get();
    entry.assign(3);
    expect(entry.isRead).toBe(true);
  });
});

describe('TypedStore', () => {
  it('round-trips a value and marks it read', () => {
    const store = new TypedStore<number>();
    store.set('threads', 4);
    expect(store.isRead('threads')).toBe(false);
    expect(store.get('threads')).toBe(4);
    expect(store.isRead('threads')).toBe(true);
  });

  it('overwriting a read value makes it unread again', () => {
    const store = new TypedStore<number>();
    store.set('threads', 4);
    store.get('threads');
    store.set('threads', 8);
    expect(store.isRead('threads')).toBe(false);
    expect(store.get('threads')).toBe(8);
    expect(store.size).toBe(1);
  });

  it('throws KeyNotFoundError for a missing key', () => {
    const store = new TypedStore<string>();
    expect(() => store.get('missing')).toThrow(KeyNotFoundError);
  });

  it('isRead is false for a missing key', () => {
    const store = new TypedStore<boolean>();
    expect(store.isRead('missing')).toBe(false);
  });

  it('findUnread returns the first unread key in insertion order', () => {
    const store = new TypedStore<number>();
    store.set('a', 1);
    store.set('b', 2);
    store.set('c', 3);
    store.get('a');
    expect(store.findUnread()).toBe('b');
    store.get('b');
    expect(store.findUnread()).toBe('c');
    store.get('c');
    expect(store.findUnread()).toBeUndefined();
  });

  it('slot creates a missing entry with the zero value', () => {
    const store = new TypedStore<number>();
    const entry = store.slot('n', 0);
    expect(store.has('n')).toBe(true);
    expect(entry.peek()).toBe(0);
    expect(store.slot('n', 99)).toBe(entry);
  });

  it('lists keys', () => {
    const store = new TypedStore<string>();
    store.set('x', '1');
    store.set('y', '2');
    expect(store.keys()).toEqual(['x', 'y']);
  });
});

describe('isValueOf', () => {
  it('accepts values of the matching kind', () => {
    expect(isValueOf('bool', true)).toBe(true);
    expect(isValueOf('int', -3)).toBe(true);
    expect(isValueOf('float', 2.5)).toBe(true);
    expect(isValueOf('string', '')).toBe(true);
  });

  it('rejects values of another kind', () => {
    expect(isValueOf('bool', 1)).toBe(false);
    expect(isValueOf('int', 1.5)).toBe(false);
    expect(isValueOf('int', Number.MAX_SAFE_INTEGER + 2)).toBe(false);
    expect(isValueOf('float', '1.0')).toBe(false);
    expect(isValueOf('string', 7)).toBe(false);
  });
});
