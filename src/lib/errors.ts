/**
 * Error classes shared by the pipeline and its collaborators
 */

export class ThreatlensError extends Error {
  constructor(
    message: string,
    public code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'ThreatlensError'
  }
}

export class ConfigError extends ThreatlensError {
  constructor(public issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'config_invalid')
    this.name = 'ConfigError'
  }
}

export type UploadRejection = 'missing_file' | 'unsupported_type' | 'too_large' | 'unreadable_image'

export class UploadRejectedError extends ThreatlensError {
  constructor(
    message: string,
    public reason: UploadRejection,
    options?: { cause?: unknown }
  ) {
    super(message, 'upload_rejected', options)
    this.name = 'UploadRejectedError'
  }
}

/**
 * Transport failure talking to the detector, with timeout support
 */
export class DetectorError extends ThreatlensError {
  constructor(
    message: string,
    public status?: number,
    public isTimeout = false,
    public isCanceled = false
  ) {
    super(message, 'detector_failed')
    this.name = 'DetectorError'
  }
}

export class DetectorOutputError extends ThreatlensError {
  constructor(message: string) {
    super(message, 'detector_output_invalid')
    this.name = 'DetectorOutputError'
  }
}

export class DetectionFailedError extends ThreatlensError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'detection_failed', options)
    this.name = 'DetectionFailedError'
  }
}

export class AuditLogWriteError extends ThreatlensError {
  constructor(
    message: string,
    public imageId: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'audit_write_failed', options)
    this.name = 'AuditLogWriteError'
  }
}

export class EventLogReadError extends ThreatlensError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'event_log_unreadable', options)
    this.name = 'EventLogReadError'
  }
}

export class ScanNotFoundError extends ThreatlensError {
  constructor(public scanId: string) {
    super(`Scan ${scanId} not found`, 'scan_not_found')
    this.name = 'ScanNotFoundError'
  }
}

export class ScanConflictError extends ThreatlensError {
  constructor(public scanId: string) {
    super(`Scan ${scanId} already has an artifact`, 'scan_exists')
    this.name = 'ScanConflictError'
  }
}

export class ScanStoreCorruptError extends ThreatlensError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'scan_store_corrupt', options)
    this.name = 'ScanStoreCorruptError'
  }
}

export class LlmError extends ThreatlensError {
  constructor(
    message: string,
    public status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'llm_failed', options)
    this.name = 'LlmError'
  }
}

// Errors raised by Node's own modules can come from another realm (a vm
// context, Jest's sandbox), so these checks look at shape, not prototype.
export function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message
  }
  return 'An unknown error occurred'
}
