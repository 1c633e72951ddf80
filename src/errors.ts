/**
 * Consolidated error system for daylog-engine.
 *
 * All error classes extend DaylogError, which carries a typed error code.
 * Modules re-export the classes they throw so callers can import them from
 * where they are raised.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const DaylogErrorCode = {
  // Adapter layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  NOT_FOUND: 'NOT_FOUND',
  FOREIGN_KEY: 'FOREIGN_KEY',

  // Processing units
  DECODE: 'DECODE',
  PERSISTENCE: 'PERSISTENCE',
  NOTIFICATION_SCHEDULING: 'NOTIFICATION_SCHEDULING',

  // Input validation
  VALIDATION: 'VALIDATION',
  INVALID_RULE: 'INVALID_RULE',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type DaylogErrorCode = (typeof DaylogErrorCode)[keyof typeof DaylogErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class DaylogError extends Error {
  readonly code: DaylogErrorCode

  constructor(code: DaylogErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'DaylogError'
    this.code = code
  }
}

// ============================================================================
// Adapter Errors
// ============================================================================

export class DuplicateKeyError extends DaylogError {
  constructor(message: string) {
    super(DaylogErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class NotFoundError extends DaylogError {
  constructor(message: string) {
    super(DaylogErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

export class ForeignKeyError extends DaylogError {
  constructor(message: string) {
    super(DaylogErrorCode.FOREIGN_KEY, message)
    this.name = 'ForeignKeyError'
  }
}

// ============================================================================
// Processing Errors
// ============================================================================

/** A stored record or recurrence rule could not be decoded. */
export class DecodeError extends DaylogError {
  readonly recordId: string | undefined

  constructor(message: string, recordId?: string) {
    super(DaylogErrorCode.DECODE, message)
    this.name = 'DecodeError'
    this.recordId = recordId
  }
}

/** A fetch or save failed inside a unit of work. */
export class PersistenceError extends DaylogError {
  constructor(message: string, cause?: unknown) {
    super(DaylogErrorCode.PERSISTENCE, message, { cause })
    this.name = 'PersistenceError'
  }
}

/** The notification scheduler rejected or failed a request. */
export class NotificationSchedulingError extends DaylogError {
  readonly taskId: string

  constructor(taskId: string, message: string, cause?: unknown) {
    super(DaylogErrorCode.NOTIFICATION_SCHEDULING, message, { cause })
    this.name = 'NotificationSchedulingError'
    this.taskId = taskId
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class ValidationError extends DaylogError {
  constructor(message: string) {
    super(DaylogErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class InvalidRuleError extends DaylogError {
  constructor(message: string) {
    super(DaylogErrorCode.INVALID_RULE, message)
    this.name = 'InvalidRuleError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends DaylogError {
  constructor(message: string) {
    super(DaylogErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
