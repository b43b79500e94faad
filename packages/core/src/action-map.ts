import type { ActionId, ActionSnapshot } from './action.js';
import type { ActionState } from './action-state.js';
import type { ActionValue } from './action-value.js';

/**
 * Read access to the actions already evaluated in the current pass.
 */
export interface ActionLookup {
  get(id: ActionId): ActionSnapshot | undefined;
  has(id: ActionId): boolean;
}

/**
 * Declaration-ordered map of action snapshots.
 *
 * During a pass the map grows one action at a time, so conditions and
 * modifiers only ever see actions declared before the one being evaluated.
 */
export class ActionMap implements ActionLookup, Iterable<ActionSnapshot> {
  private readonly entries = new Map<ActionId, ActionSnapshot>();

  static from(snapshots: Iterable<ActionSnapshot>): ActionMap {
    const map = new ActionMap();
    for (const snapshot of snapshots) {
      map.insert(snapshot);
    }
    return map;
  }

  insert(snapshot: ActionSnapshot): void {
    this.entries.set(snapshot.id, snapshot);
  }

  get(id: ActionId): ActionSnapshot | undefined {
    return this.entries.get(id);
  }

  has(id: ActionId): boolean {
    return this.entries.has(id);
  }

  state(id: ActionId): ActionState | undefined {
    return this.entries.get(id)?.state;
  }

  value(id: ActionId): ActionValue | undefined {
    return this.entries.get(id)?.value;
  }

  get size(): number {
    return this.entries.size;
  }

  ids(): ActionId[] {
    return Array.from(this.entries.keys());
  }

  [Symbol.iterator](): Iterator<ActionSnapshot> {
    return this.entries.values();
  }
}
