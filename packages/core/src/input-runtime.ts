import type { ActionId, ActionSnapshot } from './action.js';
import { ActionState } from './action-state.js';
import type { ActionValue } from './action-value.js';
import type { InputContextDefinition } from './binding.js';
import { createConditionRegistry } from './conditions/create-condition.js';
import type { ConditionRegistry } from './conditions/create-condition.js';
import { resolveInputConfig } from './config.js';
import type { InputConfig, InputConfigOverrides } from './config.js';
import type { DeviceSnapshot } from './device.js';
import { InputConfigurationError } from './errors.js';
import { InputContext } from './input-context.js';
import { InputReader } from './input-reader.js';
import { clampFrameDelta, frameTime } from './input-time.js';
import type { FrameTime } from './input-time.js';
import { createModifierRegistry } from './modifiers/modifier-pipeline.js';
import type { ModifierRegistry } from './modifiers/modifier-pipeline.js';
import { telemetry } from './telemetry.js';
import { assertInputContextDefinition } from './validation/definitions.js';

export const RUNTIME_VALIDATION_CODES = {
  duplicateContextId: 'runtime.duplicateContextId',
} as const;

export interface InputRuntimeOptions {
  readonly config?: InputConfigOverrides;
  /**
   * Shared table of custom condition kinds. A fresh one is created when
   * omitted and exposed as {@link InputRuntime.conditions}.
   */
  readonly conditionRegistry?: ConditionRegistry;
  readonly modifierRegistry?: ModifierRegistry;
}

/**
 * Owns the registered input contexts and advances them once per frame.
 *
 * @example
 * const runtime = new InputRuntime();
 * runtime.registerContext({
 *   id: 'player',
 *   actions: [{ id: 'jump', output: 'bool', inputs: [keyboard('Space')] }],
 * });
 * runtime.update(device.snapshot(), 1 / 60);
 * runtime.state('player', 'jump');
 */
export class InputRuntime {
  readonly config: InputConfig;
  readonly conditions: ConditionRegistry;
  readonly modifiers: ModifierRegistry;
  private readonly contexts = new Map<string, InputContext>();
  private frame = 0;
  private elapsedSecs = 0;

  constructor(options: InputRuntimeOptions = {}) {
    this.config = resolveInputConfig(options.config);
    this.conditions = options.conditionRegistry ?? createConditionRegistry();
    this.modifiers = options.modifierRegistry ?? createModifierRegistry();
  }

  /**
   * Validates and binds a context. Contexts are evaluated in registration
   * order, and consumed inputs stay hidden from later contexts.
   *
   * @throws InputConfigurationError when the definition is malformed, reuses
   * an id, or names an unregistered custom kind.
   */
  registerContext(definition: InputContextDefinition): InputContext {
    if (this.contexts.has(definition.id)) {
      throw new InputConfigurationError(
        `Input context "${definition.id}" is already registered.`,
        [
          {
            code: RUNTIME_VALIDATION_CODES.duplicateContextId,
            message: `Input context "${definition.id}" is already registered.`,
            path: ['id'],
          },
        ],
      );
    }

    let context: InputContext;
    try {
      assertInputContextDefinition(definition);
      context = new InputContext(definition, {
        config: this.config,
        conditionRegistry: this.conditions,
        modifierRegistry: this.modifiers,
      });
    } catch (error) {
      telemetry.recordError('InputContextRejected', {
        contextId: definition.id,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    this.contexts.set(definition.id, context);
    telemetry.recordProgress('InputContextRegistered', {
      contextId: definition.id,
      actions: definition.actions.length,
    });
    return context;
  }

  removeContext(id: string): boolean {
    const removed = this.contexts.delete(id);
    if (removed) {
      telemetry.recordProgress('InputContextRemoved', { contextId: id });
    }
    return removed;
  }

  hasContext(id: string): boolean {
    return this.contexts.has(id);
  }

  getContext(id: string): InputContext | undefined {
    return this.contexts.get(id);
  }

  contextIds(): string[] {
    return Array.from(this.contexts.keys());
  }

  get currentFrame(): number {
    return this.frame;
  }

  /**
   * Evaluates every context against one device snapshot.
   *
   * `deltaSecs` is clamped to `[0, limits.maxFrameDeltaSecs]`; a non-finite
   * delta counts as zero.
   */
  update(snapshot: DeviceSnapshot, deltaSecs: number): FrameTime {
    const delta = clampFrameDelta(deltaSecs, this.config.limits.maxFrameDeltaSecs);
    this.elapsedSecs += delta;
    const time = frameTime(delta, this.elapsedSecs);
    const reader = new InputReader(snapshot);

    let activeActions = 0;
    for (const context of this.contexts.values()) {
      context.update(reader, time);
      for (const action of context.actions) {
        if (action.state !== ActionState.None) {
          activeActions += 1;
        }
      }
    }

    this.frame += 1;
    telemetry.recordFrame(this.frame);
    telemetry.recordCounters('input.frame', {
      contexts: this.contexts.size,
      activeActions,
    });
    return time;
  }

  action(contextId: string, actionId: ActionId): ActionSnapshot | undefined {
    return this.contexts.get(contextId)?.action(actionId);
  }

  state(contextId: string, actionId: ActionId): ActionState | undefined {
    return this.contexts.get(contextId)?.state(actionId);
  }

  value(contextId: string, actionId: ActionId): ActionValue | undefined {
    return this.contexts.get(contextId)?.value(actionId);
  }
}
