import { executeDrop } from './dropper.js';
import { fetchInventory } from './inventory.js';
import { resolveNamespace } from './namespace.js';
import { SelectionState, assertConsistent, type SelectionView } from './selection.js';
import type {
  DropHooks,
  DropMode,
  DropReport,
  Inventory,
  NamespaceId,
  SqlExecutor,
} from './types.js';

/**
 * Owns the loaded inventory and the operator's selection. UI drivers call
 * these methods and render what they return; nothing else writes the
 * inventory or the selection.
 */
export class TableDropper {
  private readonly executor: SqlExecutor;
  private currentNamespace: NamespaceId | null = null;
  private currentInventory: Inventory = Object.freeze([]);
  private readonly state: SelectionState;

  constructor(executor: SqlExecutor, selection: SelectionState = new SelectionState()) {
    this.executor = executor;
    this.state = selection;
    this.state.rebuild(this.currentInventory);
  }

  /** Read-only; selection changes go through `toggle` and `selectAll`. */
  get selection(): SelectionView {
    return this.state;
  }

  get namespace(): NamespaceId | null {
    return this.currentNamespace;
  }

  get inventory(): Inventory {
    return this.currentInventory;
  }

  /**
   * Resolves and lists a namespace. State is only replaced once the fetch
   * succeeds, so a failed load keeps the previous tables and selection.
   */
  async load(rawNamespace: string): Promise<Inventory> {
    const namespace = resolveNamespace(rawNamespace);
    const inventory = await fetchInventory(this.executor, namespace);

    this.currentNamespace = namespace;
    this.currentInventory = inventory;
    this.state.rebuild(inventory);
    return inventory;
  }

  async reload(): Promise<Inventory> {
    if (!this.currentNamespace) {
      return this.currentInventory;
    }
    return this.load(this.currentNamespace.qualified);
  }

  toggle(name: string, value: boolean): void {
    this.state.toggle(name, value);
  }

  selectAll(value: boolean): void {
    this.state.selectAll(value);
  }

  async drop(mode: DropMode, hooks?: DropHooks): Promise<DropReport> {
    const namespace = this.currentNamespace;
    if (!namespace) {
      return { mode, entries: [], signal: 'no-selection' };
    }

    assertConsistent(this.state, this.currentInventory);

    return executeDrop(
      this.executor,
      { namespace, tableNames: this.state.selectedNames(), mode },
      hooks
    );
  }
}
