/**
 * errorClassifier.ts
 *
 * Maps any failure (a thrown Error, an HTTP-like response error, an abort,
 * a plain string, null) to a ClassifiedError.
 *
 * The classifier is pure and total: it never throws and never logs. Rules are
 * applied in priority order and the first match wins:
 *
 *   1. cancelled        CancelledError, AbortError, axios ERR_CANCELED
 *   2. noConnectivity   DNS / socket error codes, NoConnectivityError,
 *                       "failed to fetch"-style messages
 *   3. timeout          TimeoutError, ETIMEDOUT and friends
 *   4. HTTP status      >= 500 serverFault; 4xx validationFailure when the body
 *                       has a field-keyed `errors` map, clientFault otherwise
 *   5. unclassified     message = the failure's string form
 */

import type { ClassifiedError, ErrorClassifier, FieldErrors } from './types'
import {
  CancelledError,
  NoConnectivityError,
  TimeoutError,
  createClassifiedError,
  describeErrorKind,
  describeStatusCode,
  isClassifiedError,
} from './errors'
import { isObjectLike } from './utils'

// ---------------------------------------------------------------------------
// Markers
// ---------------------------------------------------------------------------

const CANCELLED_CODES = new Set(['ERR_CANCELED'])

const CONNECTIVITY_CODES = new Set([
  'ENOTFOUND',
  'EAI_AGAIN',
  'ECONNREFUSED',
  'ECONNRESET',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ENETDOWN',
  'ERR_NETWORK',
])

const CONNECTIVITY_PHRASES = [
  'no internet',
  'network unavailable',
  'connection failed',
  'host unreachable',
  'failed to fetch',
  'fetch failed',
  'network request failed',
]

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'ECONNABORTED',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
])

// ---------------------------------------------------------------------------
// Readers for optional properties of an unknown failure
// ---------------------------------------------------------------------------

function readString(source: unknown, key: string): string | undefined {
  if (!isObjectLike(source)) return undefined
  const value = source[key]
  return typeof value === 'string' && value ? value : undefined
}

/** Error codes on the failure itself and on its `cause` (undici nests them there). */
function readCodes(failure: unknown): string[] {
  const codes: string[] = []
  const own = readString(failure, 'code')
  if (own) codes.push(own)
  if (isObjectLike(failure)) {
    const nested = readString(failure.cause, 'code')
    if (nested) codes.push(nested)
  }
  return codes
}

function readStatusCode(failure: unknown): number | undefined {
  if (!isObjectLike(failure)) return undefined
  const candidates: unknown[] = [
    failure.status,
    failure.statusCode,
    isObjectLike(failure.response) ? failure.response.status : undefined,
  ]
  return candidates.find(
    (value): value is number => typeof value === 'number' && Number.isInteger(value),
  )
}

function readBody(failure: unknown): unknown {
  if (!isObjectLike(failure)) return undefined
  if (failure.body !== undefined) return failure.body
  if (failure.data !== undefined) return failure.data
  if (isObjectLike(failure.response)) return failure.response.data
  return undefined
}

/**
 * Extract `{ errors: { field: string | string[] } }`. Returns undefined when
 * the body has no such map or the map yields no messages.
 */
function readFieldErrors(body: unknown): FieldErrors | undefined {
  if (!isObjectLike(body)) return undefined
  const errors = body.errors
  if (!isObjectLike(errors) || Array.isArray(errors)) return undefined

  const result: Record<string, string[]> = {}
  for (const [field, value] of Object.entries(errors)) {
    if (typeof value === 'string') {
      result[field] = [value]
    } else if (Array.isArray(value)) {
      const messages = value.filter((item): item is string => typeof item === 'string')
      if (messages.length) result[field] = messages
    }
  }
  return Object.keys(result).length ? result : undefined
}

/** The failure's string form; never throws and never returns ''. */
function stringifyFailure(failure: unknown): string {
  try {
    if (failure instanceof Error) {
      return failure.message || failure.name
    }
    if (typeof failure === 'string') {
      return failure
    }
    if (failure === null || failure === undefined) {
      return String(failure)
    }
    if (typeof failure === 'object') {
      const message = readString(failure, 'message')
      if (message) return message
      const text = String(failure)
      if (text !== '[object Object]') return text
      const json = JSON.stringify(failure)
      return json && json !== '{}' ? json : text
    }
    return String(failure)
  } catch {
    return describeErrorKind('unclassified')
  }
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

function isCancelled(failure: unknown, codes: string[]): boolean {
  if (failure instanceof CancelledError) return true
  const name = readString(failure, 'name')
  if (name === 'AbortError' || name === 'CancelledError') return true
  return codes.some((code) => CANCELLED_CODES.has(code))
}

function isTimeout(failure: unknown, codes: string[]): boolean {
  if (failure instanceof TimeoutError) return true
  if (readString(failure, 'name') === 'TimeoutError') return true
  return codes.some((code) => TIMEOUT_CODES.has(code))
}

function isNoConnectivity(failure: unknown, codes: string[]): boolean {
  if (failure instanceof NoConnectivityError) return true
  if (codes.some((code) => CONNECTIVITY_CODES.has(code))) return true
  // A generic "fetch failed" whose cause is a timeout code belongs to rule 3.
  if (codes.some((code) => TIMEOUT_CODES.has(code))) return false
  const message = (failure instanceof Error ? failure.message : readString(failure, 'message') ?? '')
    .toLowerCase()
  return CONNECTIVITY_PHRASES.some((phrase) => message.includes(phrase))
}

/** Rebuild a ClassifiedError-shaped value so it is frozen and consistent. */
function normalizeClassified(error: ClassifiedError): ClassifiedError {
  return createClassifiedError({
    kind: error.kind,
    message: error.message,
    rawCause: error.rawCause,
    statusCode: typeof error.statusCode === 'number' ? error.statusCode : undefined,
    fieldErrors: readFieldErrors({ errors: error.fieldErrors }),
  })
}

function classifyUnsafe(failure: unknown): ClassifiedError {
  if (isClassifiedError(failure)) return normalizeClassified(failure)

  const codes = readCodes(failure)

  if (isCancelled(failure, codes)) {
    return createClassifiedError({
      kind: 'cancelled',
      message: describeErrorKind('cancelled'),
      rawCause: failure,
    })
  }

  if (isNoConnectivity(failure, codes)) {
    return createClassifiedError({
      kind: 'noConnectivity',
      message: describeErrorKind('noConnectivity'),
      rawCause: failure,
    })
  }

  if (isTimeout(failure, codes)) {
    return createClassifiedError({
      kind: 'timeout',
      message: describeErrorKind('timeout'),
      rawCause: failure,
    })
  }

  const statusCode = readStatusCode(failure)
  if (statusCode !== undefined && statusCode >= 400) {
    const body = readBody(failure)
    const message = readString(body, 'message') ?? describeStatusCode(statusCode)

    if (statusCode >= 500) {
      return createClassifiedError({ kind: 'serverFault', message, statusCode, rawCause: failure })
    }

    const fieldErrors = readFieldErrors(body)
    if (fieldErrors) {
      return createClassifiedError({
        kind: 'validationFailure',
        message,
        statusCode,
        fieldErrors,
        rawCause: failure,
      })
    }
    return createClassifiedError({ kind: 'clientFault', message, statusCode, rawCause: failure })
  }

  return createClassifiedError({
    kind: 'unclassified',
    message: stringifyFailure(failure),
    rawCause: failure,
  })
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Classify any failure into the closed taxonomy. Never throws: a failure
 * whose properties cannot even be read (a hostile Proxy, a throwing getter)
 * is reported as `unclassified`.
 */
export const classifyError: ErrorClassifier = (failure) => {
  try {
    return classifyUnsafe(failure)
  } catch {
    return createClassifiedError({
      kind: 'unclassified',
      message: describeErrorKind('unclassified'),
      rawCause: failure,
    })
  }
}
