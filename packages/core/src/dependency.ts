import type { ActionId, ActionSnapshot } from './action.js';
import type { ActionLookup } from './action-map.js';
import { telemetry } from './telemetry.js';

export const DIAGNOSTIC_EVENTS = {
  ACTION_DEPENDENCY_MISSING: 'ActionDependencyMissing',
} as const;

/**
 * Resolves an action another binding depends on within the current pass.
 *
 * A missing dependency (unbound, or declared later in the context) is
 * reported once per lookup and yields `undefined`.
 */
export function resolveDependency(
  actions: ActionLookup,
  dependency: ActionId,
  requester: string,
): ActionSnapshot | undefined {
  const action = actions.get(dependency);
  if (!action) {
    telemetry.recordWarning(DIAGNOSTIC_EVENTS.ACTION_DEPENDENCY_MISSING, {
      dependency,
      requester,
      message: `action "${dependency}" is not present in context`,
    });
  }
  return action;
}
