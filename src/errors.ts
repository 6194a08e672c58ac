/**
 * Error taxonomy.
 *
 * Every failure that reaches the CLI is an OrchestratorError carrying one of
 * the codes below; the code decides the process exit status.
 */

export const ERROR_CODES = {
  // Invocation / configuration
  E_ROLE_UNKNOWN: { message: 'Unknown server role.', exitCode: 2 },
  E_ACTION_UNKNOWN: { message: 'Unknown action.', exitCode: 3 },
  E_CONFIG_MISSING: { message: 'Configuration file not found.', exitCode: 4 },
  E_CONFIG_INVALID: { message: 'Configuration is invalid.', exitCode: 4 },
  E_APP_DIR_MISSING: { message: 'Application directory not found.', exitCode: 5 },

  // Start
  E_PORT_IN_USE: { message: 'The configured port is already in use.', exitCode: 6 },
  E_DEPENDENCY_UNRESOLVED: { message: 'A declared dependency could not be resolved.', exitCode: 6 },
  E_ALREADY_RUNNING: { message: 'An instance of this role is already running.', exitCode: 6 },
  E_RESOURCE_CREATE: { message: 'Failed to create an OS resource.', exitCode: 6 },

  // Stop
  E_STOP_FAILED: { message: 'Failed to stop the instance.', exitCode: 7 },

  // Absorbed locally, never fatal
  E_PROBE_TIMEOUT: { message: 'Health probe timed out.', exitCode: 1 },
  E_PROBE_FAILED: { message: 'Health probe failed.', exitCode: 1 },
  E_METRICS_UNAVAILABLE: { message: 'Metrics source unavailable.', exitCode: 1 },

  E_UNKNOWN: { message: 'An unknown error occurred.', exitCode: 1 },
} as const;

export type ErrorCode = keyof typeof ERROR_CODES;

export class OrchestratorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message?: string, options?: { cause?: unknown }) {
    super(message ?? ERROR_CODES[code].message, options);
    this.name = 'OrchestratorError';
    this.code = code;
  }

  get exitCode(): number {
    return ERROR_CODES[this.code].exitCode;
  }
}

/** Missing file, malformed document, missing field, invalid role/action */
export class ConfigError extends OrchestratorError {
  constructor(code: ErrorCode, message?: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = 'ConfigError';
  }
}

/** Port bound, dependency unresolved, OS resource creation failure */
export class StartError extends OrchestratorError {
  constructor(code: ErrorCode, message?: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = 'StartError';
  }
}

export class StopError extends OrchestratorError {
  constructor(code: ErrorCode, message?: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = 'StopError';
  }
}

/** Fed into HealthChecker counters only */
export class ProbeError extends OrchestratorError {
  constructor(code: 'E_PROBE_TIMEOUT' | 'E_PROBE_FAILED', message?: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = 'ProbeError';
  }
}

/** Metrics source failure; the rule's condition becomes unknown */
export class AlertEvalError extends OrchestratorError {
  constructor(message?: string, options?: { cause?: unknown }) {
    super('E_METRICS_UNAVAILABLE', message, options);
    this.name = 'AlertEvalError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Wrap anything thrown into an OrchestratorError, keeping classified ones. */
export function toOrchestratorError(err: unknown, fallback: ErrorCode = 'E_UNKNOWN'): OrchestratorError {
  if (err instanceof OrchestratorError) return err;
  return new OrchestratorError(fallback, errorMessage(err), { cause: err });
}

/** Single-line, user-facing failure classification. */
export function formatFailure(err: OrchestratorError, role: string, action: string): string {
  return `Error [${err.code}] ${role}/${action}: ${err.message}`;
}
