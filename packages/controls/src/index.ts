export {
  arrowKeys,
  axial,
  bidirectional,
  cardinal,
  dpadButtons,
  hjklyubnKeys,
  leftStick,
  numpadKeys,
  ordinal,
  rightStick,
  spatial,
  wasdKeys,
} from './presets.js';
export type {
  AxialInputs,
  BidirectionalInputs,
  CardinalInputs,
  OrdinalInputs,
  SpatialInputs,
} from './presets.js';
export {
  INPUT_CONTEXT_VALIDATION_CODES,
  validateInputContext,
} from './validation.js';
export type {
  InputContextValidationCode,
  InputContextValidationIssue,
  InputContextValidationIssueSeverity,
} from './validation.js';
