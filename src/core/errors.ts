/**
 * errors.ts
 *
 * Error classes the library raises or recognises, the ClassifiedError
 * constructor, and helpers for reading field-level validation detail.
 */

import type { ClassifiedError, ErrorKind, FieldErrors } from './types'
import { isObjectLike } from './utils'

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

/** A non-2xx HTTP response. `body` is the decoded JSON, or the raw text. */
export class HttpResponseError extends Error {
  readonly status: number
  readonly statusText: string
  readonly body: unknown
  readonly url: string | undefined

  constructor(
    status: number,
    options: { statusText?: string; body?: unknown; url?: string } = {},
  ) {
    super(`Request failed with status ${status}${options.statusText ? ` ${options.statusText}` : ''}`)
    this.name = 'HttpResponseError'
    this.status = status
    this.statusText = options.statusText ?? ''
    this.body = options.body
    this.url = options.url
  }
}

/** The request was abandoned by refresh(), destroy() or the caller. */
export class CancelledError extends Error {
  constructor(message = 'Request was cancelled.') {
    super(message)
    this.name = 'CancelledError'
  }
}

/** The request did not settle within the configured timeout. */
export class TimeoutError extends Error {
  readonly timeout: number | undefined

  constructor(timeout?: number) {
    super(timeout === undefined ? 'Request timed out.' : `Request timed out after ${timeout}ms.`)
    this.name = 'TimeoutError'
    this.timeout = timeout
  }
}

/** The device or process has no route to the server. */
export class NoConnectivityError extends Error {
  constructor(message = 'No internet connection.') {
    super(message)
    this.name = 'NoConnectivityError'
  }
}

// ---------------------------------------------------------------------------
// ClassifiedError construction
// ---------------------------------------------------------------------------

export const ERROR_KINDS: ReadonlyArray<ErrorKind> = [
  'noConnectivity',
  'serverFault',
  'clientFault',
  'validationFailure',
  'timeout',
  'cancelled',
  'unclassified',
]

interface ClassifiedErrorInit {
  kind: ErrorKind
  message: string
  rawCause: unknown
  statusCode?: number
  fieldErrors?: FieldErrors
}

/**
 * Build a frozen ClassifiedError. `fieldErrors` is kept only for
 * validation failures, and an empty message falls back to the kind's
 * description.
 */
export function createClassifiedError(init: ClassifiedErrorInit): ClassifiedError {
  const error: ClassifiedError = {
    kind: init.kind,
    message: init.message || describeErrorKind(init.kind),
    rawCause: init.rawCause,
    ...(init.statusCode !== undefined && { statusCode: init.statusCode }),
    ...(init.kind === 'validationFailure' && {
      fieldErrors: Object.freeze(
        Object.fromEntries(
          Object.entries(init.fieldErrors ?? {}).map(([field, messages]) => [
            field,
            Object.freeze([...messages]),
          ]),
        ),
      ),
    }),
  }
  return Object.freeze(error)
}

/** Narrow an unknown value to a ClassifiedError. */
export function isClassifiedError(value: unknown): value is ClassifiedError {
  return (
    isObjectLike(value) &&
    typeof value.kind === 'string' &&
    ERROR_KINDS.some((kind) => kind === value.kind) &&
    typeof value.message === 'string' &&
    'rawCause' in value
  )
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

/** Generic, user-facing description of an error kind. */
export function describeErrorKind(kind: ErrorKind): string {
  switch (kind) {
    case 'noConnectivity':
      return 'Please check your network settings.'
    case 'serverFault':
      return 'Server error occurred. Please try again later.'
    case 'clientFault':
      return 'Client error occurred. Please try again.'
    case 'validationFailure':
      return 'Validation failed. Please check your input.'
    case 'timeout':
      return 'Request timed out. Please try again.'
    case 'cancelled':
      return 'Request was cancelled.'
    case 'unclassified':
      return 'An unknown error occurred.'
  }
}

/** Default message for an HTTP status when the server sent none. */
export function describeStatusCode(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'Bad request. Please check your input and try again.'
    case 401:
      return 'Authentication failed. Please log in again.'
    case 403:
      return "Access denied. You don't have permission to perform this action."
    case 404:
      return 'The requested resource was not found.'
    case 422:
      return 'Validation failed. Please check your input.'
    case 429:
      return 'Too many requests. Please wait and try again.'
    case 500:
      return 'Internal server error. Please try again later.'
    case 502:
      return 'Bad gateway. Please try again later.'
    case 503:
      return 'Service unavailable. Please try again later.'
    case 504:
      return 'Gateway timeout. Please try again later.'
  }
  if (statusCode >= 500) return describeErrorKind('serverFault')
  if (statusCode >= 400) return describeErrorKind('clientFault')
  return `HTTP error ${statusCode} occurred.`
}

// ---------------------------------------------------------------------------
// Field errors
// ---------------------------------------------------------------------------

/** The first message of the first field, if any. */
export function firstFieldError(error: ClassifiedError): string | undefined {
  for (const messages of Object.values(error.fieldErrors ?? {})) {
    if (messages.length) return messages[0]
  }
  return undefined
}

/**
 * One `field: message` line per validation message, or the error's message
 * when there is no field detail.
 */
export function formatFieldErrors(error: ClassifiedError): string {
  const lines = Object.entries(error.fieldErrors ?? {}).flatMap(([field, messages]) =>
    messages.map((message) => `${field}: ${message}`),
  )
  return lines.length ? lines.join('\n') : error.message
}
