/**
 * Graphform Error System Module
 * Tree-shakable exports for error handling
 */

// Core error taxonomy
export {
  ErrorCategory,
  ErrorSeverity,
  ErrorEnvironment,
  ErrorCodeRegistry,
  GraphformError,
  isGraphformError,
  extractErrorDetails,
  type ErrorCode
} from '../core/errors/taxonomy';

// Engine errors
export {
  ENGINE_ERROR_CODES,
  ConfigurationError,
  DeclarationError,
  DuplicateNodeError,
  UnknownReferenceError,
  CyclicDependencyError,
  MissingRequiredVariableError,
  UnknownOutputError,
  ModuleRecursionLimitError,
  UnknownVariableError,
  ModuleSourceError,
  PreventDestroyViolation,
  ProviderNotFoundError,
  CorruptStateError,
  StateRecordNotFoundError,
  ProviderOperationError,
  ProvisionerFailure
} from '../core/errors/errors';
