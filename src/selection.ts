import { InconsistentSelectionError, UnknownTableError } from './errors.js';
import type { Inventory, SelectionRow } from './types.js';

const EMPTY_INVENTORY: Inventory = Object.freeze([]);

/**
 * One flag per table of the inventory it was built from. Flags never
 * survive a rebuild, even when a table name shows up again.
 */
export class SelectionState {
  private flags = new Map<string, boolean>();
  private inventory: Inventory = EMPTY_INVENTORY;

  get source(): Inventory {
    return this.inventory;
  }

  get size(): number {
    return this.flags.size;
  }

  rebuild(inventory: Inventory): void {
    const flags = new Map<string, boolean>();
    for (const table of inventory) {
      flags.set(table.name, false);
    }
    this.flags = flags;
    this.inventory = inventory;
  }

  toggle(name: string, value: boolean): void {
    if (!this.flags.has(name)) {
      throw new UnknownTableError(name);
    }
    this.flags.set(name, value);
  }

  selectAll(value: boolean): void {
    for (const name of this.flags.keys()) {
      this.flags.set(name, value);
    }
  }

  hasTable(name: string): boolean {
    return this.flags.has(name);
  }

  selectedNames(): string[] {
    return this.inventory
      .filter((table) => this.flags.get(table.name) === true)
      .map((table) => table.name);
  }

  rows(): SelectionRow[] {
    return this.inventory.map((table) => ({
      table,
      selected: this.flags.get(table.name) === true,
    }));
  }
}

export type SelectionView = Pick<SelectionState, 'size' | 'hasTable' | 'selectedNames' | 'rows'>;

/**
 * Throws unless `selection` was derived from exactly `inventory` and holds
 * one flag per inventory row.
 */
export function assertConsistent(selection: SelectionState, inventory: Inventory): void {
  if (selection.source !== inventory) {
    throw new InconsistentSelectionError('selection was built from a different inventory');
  }

  const names = new Set(inventory.map((table) => table.name));
  if (selection.size !== inventory.length || names.size !== inventory.length) {
    throw new InconsistentSelectionError(
      `${selection.size} selection flags for ${inventory.length} tables`
    );
  }

  for (const name of names) {
    if (!selection.hasTable(name)) {
      throw new InconsistentSelectionError(`no selection flag for '${name}'`);
    }
  }
}
