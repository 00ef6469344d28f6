import type {ZodError} from 'zod'
import type {ToolResponse} from './response.js'
import type {Usage} from './usage.js'

export type ErrorCode = 'VALIDATION_ERROR' | 'STRUCTURED_OUTPUT_ERROR' | 'TOOL_CALL_ERROR' | 'CONNECTION_ERROR'

export class TooltalkError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'TooltalkError'
  }
}

/** Malformed tool definition, message record, model id or out-of-range request config. */
export class ValidationError extends TooltalkError {
  constructor(message: string, cause?: unknown) {
    super(message, 'VALIDATION_ERROR', cause)
    this.name = 'ValidationError'
  }
}

export type StructuredOutputDetails = {
  rawText: string
  usage: Usage
  model: string
  cause?: unknown
}

/**
 * Raised when structured content cannot be parsed. The raw text and usage of the
 * exchange are attached so the caller can inspect them without another request.
 */
export class StructuredOutputError extends TooltalkError {
  readonly rawText: string
  readonly usage: Usage
  readonly model: string

  constructor(message: string, details: StructuredOutputDetails) {
    super(message, 'STRUCTURED_OUTPUT_ERROR', details.cause)
    this.name = 'StructuredOutputError'
    this.rawText = details.rawText
    this.usage = details.usage
    this.model = details.model
  }
}

export class ToolCallError extends TooltalkError {
  constructor(
    message: string,
    public readonly toolCallId?: string,
    public readonly response?: ToolResponse
  ) {
    super(message, 'TOOL_CALL_ERROR')
    this.name = 'ToolCallError'
  }
}

export class ConnectionError extends TooltalkError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(message, 'CONNECTION_ERROR', cause)
    this.name = 'ConnectionError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}
