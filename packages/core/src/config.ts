export type Accumulation = 'cumulative' | 'maxAbs';

export interface InputConfig {
  readonly thresholds: {
    /**
     * Magnitude an input must reach for threshold-based conditions (down,
     * press, hold, tap, ...) that do not author their own actuation.
     *
     * @defaultValue `0.5`
     */
    readonly actuation: number;
  };
  readonly limits: {
    /**
     * Upper bound applied to the frame delta handed to modifiers, conditions
     * and timers. Guards hold/tap timers and delta-scaled values against
     * frames that arrive after a long stall.
     *
     * @defaultValue `1`
     */
    readonly maxFrameDeltaSecs: number;
  };
  readonly defaults: {
    /**
     * How the values of several inputs bound to one action are merged when
     * the action does not choose.
     *
     * @defaultValue `'cumulative'`
     */
    readonly accumulation: Accumulation;
    /**
     * Whether actions hide their inputs from later actions and contexts while
     * active, when the action does not choose.
     *
     * @defaultValue `false`
     */
    readonly consumeInput: boolean;
  };
}

export type InputConfigOverrides = Readonly<{
  readonly thresholds?: Partial<InputConfig['thresholds']>;
  readonly limits?: Partial<InputConfig['limits']>;
  readonly defaults?: Partial<InputConfig['defaults']>;
}>;

export const DEFAULT_INPUT_CONFIG: InputConfig = Object.freeze({
  thresholds: Object.freeze({
    actuation: 0.5,
  }),
  limits: Object.freeze({
    maxFrameDeltaSecs: 1,
  }),
  defaults: Object.freeze({
    accumulation: 'cumulative',
    consumeInput: false,
  }),
});

function toNonNegativeNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0
    ? value
    : undefined;
}

function toPositiveNumber(value: unknown): number | undefined {
  const numeric = toNonNegativeNumber(value);
  return numeric === undefined || numeric === 0 ? undefined : numeric;
}

function toAccumulation(value: unknown): Accumulation | undefined {
  return value === 'cumulative' || value === 'maxAbs' ? value : undefined;
}

function toBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

export function resolveInputConfig(overrides?: InputConfigOverrides): InputConfig {
  const thresholds = overrides?.thresholds ?? {};
  const limits = overrides?.limits ?? {};
  const defaults = overrides?.defaults ?? {};

  return Object.freeze({
    thresholds: Object.freeze({
      actuation:
        toNonNegativeNumber(thresholds.actuation) ??
        DEFAULT_INPUT_CONFIG.thresholds.actuation,
    }),
    limits: Object.freeze({
      maxFrameDeltaSecs:
        toPositiveNumber(limits.maxFrameDeltaSecs) ??
        DEFAULT_INPUT_CONFIG.limits.maxFrameDeltaSecs,
    }),
    defaults: Object.freeze({
      accumulation:
        toAccumulation(defaults.accumulation) ??
        DEFAULT_INPUT_CONFIG.defaults.accumulation,
      consumeInput:
        toBoolean(defaults.consumeInput) ??
        DEFAULT_INPUT_CONFIG.defaults.consumeInput,
    }),
  });
}
