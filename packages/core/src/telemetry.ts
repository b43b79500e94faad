/* eslint-disable no-console */

export type TelemetryEventData = Readonly<Record<string, unknown>>;

/**
 * Sink for diagnostics raised while evaluating frames.
 *
 * Evaluation never throws for degraded data; it reports through this facade
 * instead and keeps going.
 */
export interface TelemetryFacade {
  recordError(event: string, data?: TelemetryEventData): void;
  recordWarning(event: string, data?: TelemetryEventData): void;
  recordProgress(event: string, data?: TelemetryEventData): void;
  recordCounters(group: string, counters: Readonly<Record<string, number>>): void;
  recordFrame(frame: number): void;
}

const createConsoleFacade = (prefix: string): TelemetryFacade => ({
  recordError(event, data) {
    console.error(`[${prefix}:error] ${event}`, data);
  },
  recordWarning(event, data) {
    console.warn(`[${prefix}:warning] ${event}`, data);
  },
  recordProgress(event, data) {
    console.info(`[${prefix}:progress] ${event}`, data);
  },
  recordCounters(group, counters) {
    console.info(`[${prefix}:counters] ${group}`, counters);
  },
  recordFrame(frame) {
    console.debug(`[${prefix}:frame] ${frame}`);
  },
});

/**
 * Discards everything. Active until {@link setTelemetry} is called.
 */
export const silentTelemetry: TelemetryFacade = {
  recordError() {},
  recordWarning() {},
  recordProgress() {},
  recordCounters() {},
  recordFrame() {},
};

/**
 * Facade that writes every record to the console.
 *
 * @example
 * import { setTelemetry, createConsoleTelemetry } from '@action-input/core';
 * setTelemetry(createConsoleTelemetry());
 */
export function createConsoleTelemetry(prefix = 'action-input'): TelemetryFacade {
  return createConsoleFacade(prefix);
}

let activeTelemetry: TelemetryFacade = silentTelemetry;

export const telemetry: TelemetryFacade = {
  recordError(event, data) {
    invokeSafely(activeTelemetry, 'recordError', event, data);
  },
  recordWarning(event, data) {
    invokeSafely(activeTelemetry, 'recordWarning', event, data);
  },
  recordProgress(event, data) {
    invokeSafely(activeTelemetry, 'recordProgress', event, data);
  },
  recordCounters(group, counters) {
    invokeSafely(activeTelemetry, 'recordCounters', group, counters);
  },
  recordFrame(frame) {
    invokeSafely(activeTelemetry, 'recordFrame', frame);
  },
};

export function setTelemetry(facade: TelemetryFacade): void {
  activeTelemetry = facade;
}

export function resetTelemetry(): void {
  activeTelemetry = silentTelemetry;
}

function invokeSafely<TMethod extends keyof TelemetryFacade>(
  facade: TelemetryFacade,
  method: TMethod,
  ...args: Parameters<TelemetryFacade[TMethod]>
): void {
  try {
    (
      facade[method] as (
        ...fnArgs: Parameters<TelemetryFacade[TMethod]>
      ) => ReturnType<TelemetryFacade[TMethod]>
    ).call(facade, ...args);
  } catch (error) {
    console.error('[telemetry] invocation failed', error);
  }
}
