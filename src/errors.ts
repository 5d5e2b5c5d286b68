/**
 * Consolidated error system for upgrade-timers.
 *
 * All error classes extend UpgradeTimersError, which carries a typed error code.
 * The scheduling core itself never throws; these are raised at the API edge
 * (unknown task ids, malformed instants, invalid task input, storage conflicts).
 */

// ============================================================================
// Error Codes
// ============================================================================

export const UpgradeTimersErrorCode = {
  // Adapter layer
  DUPLICATE_KEY: 'DUPLICATE_KEY',
  INVALID_DATA: 'INVALID_DATA',

  // Task tracker
  VALIDATION: 'VALIDATION',
  NOT_FOUND: 'NOT_FOUND',

  // Time & date
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type UpgradeTimersErrorCode = (typeof UpgradeTimersErrorCode)[keyof typeof UpgradeTimersErrorCode]

// ============================================================================
// Base Class
// ============================================================================

export class UpgradeTimersError extends Error {
  readonly code: UpgradeTimersErrorCode

  constructor(code: UpgradeTimersErrorCode, message: string) {
    super(message)
    this.name = 'UpgradeTimersError'
    this.code = code
  }
}

// ============================================================================
// Adapter Errors
// ============================================================================

export class DuplicateKeyError extends UpgradeTimersError {
  constructor(message: string) {
    super(UpgradeTimersErrorCode.DUPLICATE_KEY, message)
    this.name = 'DuplicateKeyError'
  }
}

export class InvalidDataError extends UpgradeTimersError {
  constructor(message: string) {
    super(UpgradeTimersErrorCode.INVALID_DATA, message)
    this.name = 'InvalidDataError'
  }
}

// ============================================================================
// Task Tracker Errors
// ============================================================================

export class ValidationError extends UpgradeTimersError {
  constructor(message: string) {
    super(UpgradeTimersErrorCode.VALIDATION, message)
    this.name = 'ValidationError'
  }
}

export class NotFoundError extends UpgradeTimersError {
  constructor(message: string) {
    super(UpgradeTimersErrorCode.NOT_FOUND, message)
    this.name = 'NotFoundError'
  }
}

// ============================================================================
// Time & Date Errors
// ============================================================================

export class ParseError extends UpgradeTimersError {
  constructor(message: string) {
    super(UpgradeTimersErrorCode.PARSE_ERROR, message)
    this.name = 'ParseError'
  }
}
