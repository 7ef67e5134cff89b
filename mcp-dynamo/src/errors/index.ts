export { ErrorCode, SimulatorError, isSimulatorError } from './error.js';
export {
  TableNotFoundError,
  TableAlreadyExistsError,
  InvalidSchemaError,
  MissingKeyError,
  InvalidExpressionError,
  InvalidParametersError,
  ConditionalCheckFailedError,
} from './categories.js';
