/**
 * Error codes for faults the verifier raises.
 * Protocol-level problems (bad symbols, undefined transitions) are step
 * results and never appear here.
 */
export const ErrorCodes = {
  CONFIG_INVALID: 'CONFIG_INVALID',
  SESSION_INVALID: 'SESSION_INVALID',
  DEFINITION_NOT_FOUND: 'DEFINITION_NOT_FOUND',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

export class HandshakeError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'HandshakeError';
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Error: transition table or definition file is malformed
 */
export class ConfigError extends HandshakeError {
  constructor(public readonly issues: string[]) {
    super(
      ErrorCodes.CONFIG_INVALID,
      issues.length === 1
        ? `Invalid automaton definition: ${issues[0]}`
        : `Invalid automaton definition (${issues.length} issues): ${issues.join('; ')}`,
    );
    this.name = 'ConfigError';
  }
}

/**
 * Error: a persisted session does not describe a run of this automaton
 */
export class SessionStateError extends HandshakeError {
  constructor(message: string, public readonly sessionPath?: string) {
    super(ErrorCodes.SESSION_INVALID, sessionPath ? `${message} (${sessionPath})` : message);
    this.name = 'SessionStateError';
  }
}

/**
 * Error: an explicitly requested definition file does not exist
 */
export class DefinitionNotFoundError extends HandshakeError {
  constructor(public readonly definitionPath: string) {
    super(ErrorCodes.DEFINITION_NOT_FOUND, `Automaton definition not found: ${definitionPath}`);
    this.name = 'DefinitionNotFoundError';
  }
}
