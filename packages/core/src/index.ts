export { ModKeys, MOD_KEY_NAMES } from './mod-keys.js';
export type { ModKeyName, PressedKeys } from './mod-keys.js';

export {
  ANY_GAMEPAD,
  EMPTY_DEVICE_SNAPSHOT,
  GAMEPAD_AXES,
  GAMEPAD_BUTTONS,
  MOUSE_BUTTONS,
  singleGamepad,
} from './device.js';
export type {
  DeviceSnapshot,
  GamepadAxis,
  GamepadButton,
  GamepadDevice,
  GamepadId,
  GamepadSnapshot,
  KeyCode,
  MouseButton,
  Vec2,
  Vec3,
} from './device.js';
export { DeviceState } from './device-state.js';

export {
  INPUT_ERROR_CODES,
  formatInput,
  gamepadAxis,
  gamepadButton,
  inputKey,
  inputModKeys,
  inputModKeysCount,
  inputSourceKey,
  inputsEqual,
  keyboard,
  mouseButton,
  mouseMotion,
  mouseWheel,
  withModKeys,
  withoutModKeys,
} from './input.js';
export type {
  Input,
  InputError,
  InputErrorCode,
  InputKind,
  InputResult,
} from './input.js';
export { InputReader } from './input-reader.js';

export {
  ACTION_VALUE_DIMS,
  asAxis1D,
  asAxis2D,
  asAxis3D,
  asBool,
  axis1d,
  axis2d,
  axis3d,
  boolValue,
  convertValue,
  formatValue,
  fromVec3,
  isActuated,
  valueLength,
  valuesEqual,
  widenValue,
  widerDim,
  zeroValue,
} from './action-value.js';
export type {
  ActionValue,
  ActionValueDim,
  Axis1DValue,
  Axis2DValue,
  Axis3DValue,
  BoolValue,
} from './action-value.js';

export { ACTION_EVENTS, ActionState, actionEventsFor } from './action-state.js';
export type { ActionEvent } from './action-state.js';
export { Action } from './action.js';
export type { ActionId, ActionSnapshot } from './action.js';
export { ActionMap } from './action-map.js';
export type { ActionLookup } from './action-map.js';

export { ZERO_FRAME_TIME, clampFrameDelta, frameTime } from './input-time.js';
export type { FrameTime } from './input-time.js';

export * from './modifiers/index.js';
export * from './conditions/index.js';
export { ConditionEvaluator, accumulate } from './condition-evaluator.js';
export { DIAGNOSTIC_EVENTS, resolveDependency } from './dependency.js';
export { VariantRegistry } from './variant-registry.js';
export type { VariantFactory, VariantOptions } from './variant-registry.js';

export {
  bindInput,
  toInputBinding,
  withConditions,
  withModifiers,
} from './binding.js';
export type {
  ActionDefinition,
  BindingSource,
  InputBindingDefinition,
  InputContextDefinition,
} from './binding.js';
export { InputContext } from './input-context.js';
export type { InputContextOptions } from './input-context.js';
export { InputRuntime, RUNTIME_VALIDATION_CODES } from './input-runtime.js';
export type { InputRuntimeOptions } from './input-runtime.js';

export { DEFAULT_INPUT_CONFIG, resolveInputConfig } from './config.js';
export type { Accumulation, InputConfig, InputConfigOverrides } from './config.js';
export { InputConfigurationError } from './errors.js';
export type { InputConfigurationIssue } from './errors.js';
export {
  CONTEXT_VALIDATION_CODES,
  assertInputContextDefinition,
  inputContextDefinitionSchema,
  toConfigurationIssues,
} from './validation/definitions.js';
export {
  parseDeviceSnapshot,
  serializeDeviceSnapshot,
  serializedDeviceSnapshotSchema,
} from './validation/device-snapshot.js';
export type { SerializedDeviceSnapshot } from './validation/device-snapshot.js';

export {
  createConsoleTelemetry,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  telemetry,
} from './telemetry.js';
export type { TelemetryEventData, TelemetryFacade } from './telemetry.js';
