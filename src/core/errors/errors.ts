/**
 * Concrete engine errors.
 *
 * Graph construction, module expansion and planning errors are fatal before anything is applied.
 * Provider and provisioner errors are scoped to a single node during apply.
 */

import {
  ErrorCategory,
  ErrorCode,
  ErrorCodeRegistry,
  ErrorSeverity,
  GraphformError
} from './taxonomy';

export const ENGINE_ERROR_CODES = {
  CONFIGURATION_INVALID: {
    code: 'GF_CONFIG_001',
    category: ErrorCategory.CONFIGURATION,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'Invalid engine configuration: {details}',
    prodMessage: 'Invalid engine configuration'
  },
  DECLARATION_INVALID: {
    code: 'GF_CONFIG_002',
    category: ErrorCategory.CONFIGURATION,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'Invalid declaration in {source}: {details}',
    prodMessage: 'Invalid declaration',
    suggestions: ['Check the module main.json against the declaration format']
  },
  DUPLICATE_NODE: {
    code: 'GF_GRAPH_001',
    category: ErrorCategory.GRAPH,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'Node {address} is declared more than once',
    prodMessage: 'Duplicate node declaration'
  },
  UNKNOWN_REFERENCE: {
    code: 'GF_GRAPH_002',
    category: ErrorCategory.GRAPH,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'Reference to undeclared {target} from {source}',
    prodMessage: 'Unresolved reference'
  },
  CYCLIC_DEPENDENCY: {
    code: 'GF_GRAPH_003',
    category: ErrorCategory.GRAPH,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'Dependency cycle: {cycleText}',
    prodMessage: 'Dependency cycle detected',
    suggestions: ['Break the cycle by removing one of the references or depends_on entries']
  },
  MISSING_REQUIRED_VARIABLE: {
    code: 'GF_MODULE_001',
    category: ErrorCategory.MODULE,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'Variable "{variable}" of {module} has no default and is not set',
    prodMessage: 'Missing required variable'
  },
  UNKNOWN_OUTPUT: {
    code: 'GF_MODULE_002',
    category: ErrorCategory.MODULE,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'Module {module} does not declare output "{output}"',
    prodMessage: 'Unknown module output'
  },
  MODULE_RECURSION_LIMIT: {
    code: 'GF_MODULE_003',
    category: ErrorCategory.MODULE,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'Module nesting exceeds limit of {limit} at {module}',
    prodMessage: 'Module nesting too deep',
    suggestions: ['Check for a module that calls itself directly or indirectly']
  },
  UNKNOWN_VARIABLE: {
    code: 'GF_MODULE_004',
    category: ErrorCategory.MODULE,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'Module {module} does not declare variable "{variable}"',
    prodMessage: 'Unknown module input'
  },
  MODULE_SOURCE: {
    code: 'GF_MODULE_005',
    category: ErrorCategory.MODULE,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'Cannot load module source "{source}": {details}',
    prodMessage: 'Cannot load module'
  },
  PREVENT_DESTROY: {
    code: 'GF_PLAN_001',
    category: ErrorCategory.PLAN,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'Plan would destroy nodes protected by prevent_destroy: {addresses}',
    prodMessage: 'Plan would destroy protected nodes',
    suggestions: ['Remove prevent_destroy from the lifecycle block if destruction is intended']
  },
  PROVIDER_NOT_FOUND: {
    code: 'GF_PLAN_002',
    category: ErrorCategory.PLAN,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'No provider registered for resource kind {kind}',
    prodMessage: 'Missing provider'
  },
  CORRUPT_STATE: {
    code: 'GF_STATE_001',
    category: ErrorCategory.STATE,
    severity: ErrorSeverity.CRITICAL,
    devMessage: 'State file {path} cannot be read: {details}',
    prodMessage: 'State file is corrupt'
  },
  STATE_RECORD_NOT_FOUND: {
    code: 'GF_STATE_002',
    category: ErrorCategory.STATE,
    severity: ErrorSeverity.ERROR,
    devMessage: 'No state record for {address}',
    prodMessage: 'Unknown node'
  },
  PROVIDER_OPERATION: {
    code: 'GF_PROVIDER_001',
    category: ErrorCategory.PROVIDER,
    severity: ErrorSeverity.ERROR,
    devMessage: 'Provider {operation} failed for {address}: {details}',
    prodMessage: 'Provider operation failed'
  },
  PROVISIONER_FAILURE: {
    code: 'GF_PROVISIONER_001',
    category: ErrorCategory.PROVISIONER,
    severity: ErrorSeverity.ERROR,
    devMessage: 'Provisioner for {address} failed while {phase} after {attempts} attempt(s): {details}',
    prodMessage: 'Provisioner failed'
  }
} as const satisfies Record<string, ErrorCode>;

for (const errorCode of Object.values(ENGINE_ERROR_CODES)) {
  ErrorCodeRegistry.register(errorCode);
}

export class ConfigurationError extends GraphformError {
  constructor(details: string, originalError?: Error) {
    super(ENGINE_ERROR_CODES.CONFIGURATION_INVALID, { details }, originalError);
  }
}

export class DeclarationError extends GraphformError {
  constructor(readonly source: string, details: string, originalError?: Error) {
    super(ENGINE_ERROR_CODES.DECLARATION_INVALID, { source, details }, originalError);
  }
}

export class DuplicateNodeError extends GraphformError {
  constructor(readonly address: string) {
    super(ENGINE_ERROR_CODES.DUPLICATE_NODE, { address });
  }
}

export class UnknownReferenceError extends GraphformError {
  /**
   * @param target - unresolved expression or address, e.g. `azurerm_subnet.main` or `var.location`
   * @param source - node (or output) holding the reference
   */
  constructor(readonly target: string, readonly source: string) {
    super(ENGINE_ERROR_CODES.UNKNOWN_REFERENCE, { target, source });
  }
}

export class CyclicDependencyError extends GraphformError {
  /**
   * @param cycle - addresses forming the cycle, first node not repeated at the end
   */
  constructor(readonly cycle: string[]) {
    super(ENGINE_ERROR_CODES.CYCLIC_DEPENDENCY, {
      cycle,
      cycleText: [...cycle, cycle[0]].join(' -> ')
    });
  }
}

export class MissingRequiredVariableError extends GraphformError {
  constructor(readonly variable: string, readonly module: string) {
    super(ENGINE_ERROR_CODES.MISSING_REQUIRED_VARIABLE, { variable, module });
  }
}

export class UnknownOutputError extends GraphformError {
  constructor(readonly output: string, readonly module: string) {
    super(ENGINE_ERROR_CODES.UNKNOWN_OUTPUT, { output, module });
  }
}

export class ModuleRecursionLimitError extends GraphformError {
  constructor(readonly module: string, readonly limit: number) {
    super(ENGINE_ERROR_CODES.MODULE_RECURSION_LIMIT, { module, limit });
  }
}

export class UnknownVariableError extends GraphformError {
  constructor(readonly variable: string, readonly module: string) {
    super(ENGINE_ERROR_CODES.UNKNOWN_VARIABLE, { variable, module });
  }
}

export class ModuleSourceError extends GraphformError {
  constructor(readonly source: string, details: string, originalError?: Error) {
    super(ENGINE_ERROR_CODES.MODULE_SOURCE, { source, details }, originalError);
  }
}

export class PreventDestroyViolation extends GraphformError {
  constructor(readonly addresses: string[]) {
    super(ENGINE_ERROR_CODES.PREVENT_DESTROY, { addresses });
  }
}

export class ProviderNotFoundError extends GraphformError {
  constructor(readonly kind: string) {
    super(ENGINE_ERROR_CODES.PROVIDER_NOT_FOUND, { kind });
  }
}

export class CorruptStateError extends GraphformError {
  constructor(readonly path: string, details: string, originalError?: Error) {
    super(ENGINE_ERROR_CODES.CORRUPT_STATE, { path, details }, originalError);
  }
}

export class StateRecordNotFoundError extends GraphformError {
  constructor(readonly address: string) {
    super(ENGINE_ERROR_CODES.STATE_RECORD_NOT_FOUND, { address });
  }
}

export type ProviderOperationName = 'create' | 'read' | 'update' | 'destroy';

export class ProviderOperationError extends GraphformError {
  constructor(
    readonly address: string,
    readonly operation: ProviderOperationName,
    details: string,
    originalError?: Error
  ) {
    super(ENGINE_ERROR_CODES.PROVIDER_OPERATION, { address, operation, details }, originalError);
  }
}

export type ProvisionerPhase = 'connecting' | 'authenticating' | 'executing';

export class ProvisionerFailure extends GraphformError {
  constructor(
    readonly address: string,
    readonly phase: ProvisionerPhase,
    readonly attempts: number,
    readonly output: string,
    details: string,
    originalError?: Error
  ) {
    super(ENGINE_ERROR_CODES.PROVISIONER_FAILURE, { address, phase, attempts, details, output }, originalError);
  }
}
