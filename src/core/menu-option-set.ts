import {
  CardinalityMismatchError,
  DuplicateLabelError,
  LabelNotFoundError,
} from '../utils/errors.js';
import type { MenuTarget, Operation } from './operations.js';

/** Names never listed as menu options, whatever the target describes. */
export const RESERVED_OPERATION_NAMES: readonly string[] = [
  'run',
  'wait',
  'equals',
  'toString',
  'hashCode',
  'getClass',
  'notify',
  'notifyAll',
];

const ACCESSOR_PREFIXES = ['get', 'set'] as const;

export interface MenuEntry {
  index: number;
  label: string;
  kind: 'operation' | 'custom';
}

export type MenuSelection =
  | { kind: 'exit' }
  | { kind: 'operation'; label: string; operation: Operation }
  | { kind: 'custom'; label: string; marker: string }
  | { kind: 'invalid' };

export interface MenuOptionSetOptions {
  hiddenNames?: readonly string[];
  customOptions?: readonly string[];
}

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function sortedKeys<V>(map: ReadonlyMap<string, V>): string[] {
  return [...map.keys()].sort(byCodeUnit);
}

function isAccessor(name: string): boolean {
  return ACCESSOR_PREFIXES.some((prefix) => name.startsWith(prefix));
}

/**
 * Numbered options for one bound target: discovered operations first, then
 * caller-declared custom options, each group in sorted label order. Indices
 * and the exit index are derived on every read.
 */
export class MenuOptionSet {
  private target: MenuTarget;
  private hiddenNames: ReadonlySet<string>;
  private methods = new Map<string, Operation>();
  private customOptions = new Map<string, string>();

  constructor(target: MenuTarget, options: MenuOptionSetOptions = {}) {
    this.target = target;
    this.hiddenNames = new Set(options.hiddenNames ?? []);
    this.setCustomOptions(options.customOptions ?? []);
    this.discover();
  }

  get excludedNames(): ReadonlySet<string> {
    return new Set([
      ...RESERVED_OPERATION_NAMES,
      ...this.hiddenNames,
      ...this.customOptions.keys(),
    ]);
  }

  bind(target: MenuTarget, hiddenNames: readonly string[] = [...this.hiddenNames]): void {
    this.target = target;
    this.hiddenNames = new Set(hiddenNames);
    this.discover();
  }

  /** Re-read the bound target's operations, e.g. after its description changed. */
  discover(): void {
    const excluded = this.excludedNames;
    const methods = new Map<string, Operation>();
    for (const operation of this.target.describeOperations()) {
      if (isAccessor(operation.name)) continue;
      if (excluded.has(operation.name)) continue;
      methods.set(operation.name, operation);
    }
    this.methods = methods;
  }

  setCustomOptions(names: readonly string[]): void {
    this.customOptions = new Map(names.map((name): [string, string] => [name, name]));
  }

  get discoveredCount(): number {
    return this.methods.size;
  }

  get customCount(): number {
    return this.customOptions.size;
  }

  get hasCustomOptions(): boolean {
    return this.customOptions.size > 0;
  }

  get exitIndex(): number {
    return this.hasCustomOptions
      ? this.discoveredCount + this.customCount + 1
      : this.discoveredCount;
  }

  methodLabels(): string[] {
    return sortedKeys(this.methods);
  }

  customLabels(): string[] {
    return sortedKeys(this.customOptions);
  }

  entries(): MenuEntry[] {
    const methods = this.methodLabels().map(
      (label, i): MenuEntry => ({ index: i + 1, label, kind: 'operation' }),
    );
    const custom = this.customLabels().map(
      (label, i): MenuEntry => ({ index: methods.length + i + 1, label, kind: 'custom' }),
    );
    return [...methods, ...custom];
  }

  resolve(selection: number): MenuSelection {
    if (selection === this.exitIndex) {
      return { kind: 'exit' };
    }

    if (selection >= 1 && selection <= this.discoveredCount) {
      const label = this.methodLabels()[selection - 1];
      const operation = this.methods.get(label);
      if (operation) {
        return { kind: 'operation', label, operation };
      }
    }

    if (selection > this.discoveredCount && selection < this.exitIndex) {
      const label = this.customLabels()[selection - this.discoveredCount - 1];
      const marker = this.customOptions.get(label);
      if (marker !== undefined) {
        return { kind: 'custom', label, marker };
      }
    }

    return { kind: 'invalid' };
  }

  renameMethodLabel(currentName: string, newName: string): void {
    if (this.customOptions.has(newName)) throw new DuplicateLabelError(newName);
    this.methods = renameOne(this.methods, currentName, newName, 'method');
  }

  renameCustomLabel(currentName: string, newName: string): void {
    if (this.methods.has(newName)) throw new DuplicateLabelError(newName);
    this.customOptions = renameOne(this.customOptions, currentName, newName, 'custom option');
  }

  /** Rename every discovered operation at once, keyed by current label. */
  renameMethodLabels(newNames: ReadonlyMap<string, string>): void {
    if (newNames.size !== this.methods.size) {
      throw new CardinalityMismatchError(this.methods.size, newNames.size);
    }

    const updated = new Map<string, Operation>();
    for (const [currentName, newName] of newNames) {
      const operation = this.methods.get(currentName);
      if (!operation) throw new LabelNotFoundError(currentName, 'method');
      if (updated.has(newName) || this.customOptions.has(newName)) {
        throw new DuplicateLabelError(newName);
      }
      updated.set(newName, operation);
    }
    this.methods = updated;
  }

  /** Relabel custom options in their current display order. */
  renameCustomLabels(newNames: readonly string[]): void {
    if (newNames.length !== this.customOptions.size) {
      throw new CardinalityMismatchError(this.customOptions.size, newNames.length);
    }

    const updated = new Map<string, string>();
    this.customLabels().forEach((currentName, i) => {
      const newName = newNames[i];
      if (updated.has(newName) || this.methods.has(newName)) {
        throw new DuplicateLabelError(newName);
      }
      const marker = this.customOptions.get(currentName) ?? currentName;
      updated.set(newName, marker);
    });
    this.customOptions = updated;
  }
}

function renameOne<V>(
  map: ReadonlyMap<string, V>,
  currentName: string,
  newName: string,
  kind: 'method' | 'custom option',
): Map<string, V> {
  const value = map.get(currentName);
  if (value === undefined) {
    throw new LabelNotFoundError(currentName, kind);
  }
  if (newName !== currentName && map.has(newName)) {
    throw new DuplicateLabelError(newName);
  }
  const updated = new Map(map);
  updated.delete(currentName);
  updated.set(newName, value);
  return updated;
}
