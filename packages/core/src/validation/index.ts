export {
  ErrorCollector,
  type FieldPath,
  type FullMessageOptions,
  type ValidationEntry,
} from './error-collector.js';

export {
  Expectations,
  isNumeric,
  isPresent,
  lengthOf,
  type CheckedValue,
  type ExpectationMessage,
  type LengthOptions,
  type MatchOptions,
  type NilOptions,
} from './expectations.js';

export {
  assertCollectionName,
  assertFieldPath,
  validateCollectionName,
  validateFieldPath,
  type InputValidationResult,
} from './input-validation.js';
