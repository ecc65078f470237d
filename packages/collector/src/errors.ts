export const CollectorErrorCode = {
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  REQUEST_FAILED: 'REQUEST_FAILED',
  RESPONSE_INVALID: 'RESPONSE_INVALID',
  CACHE_INVALID: 'CACHE_INVALID'
} as const

type CollectorErrorCodeKey = (typeof CollectorErrorCode)[keyof typeof CollectorErrorCode]

export type CollectorError = Error & {
  code: CollectorErrorCodeKey
  status?: number
  details?: unknown
}

export function makeCollectorError(
  code: CollectorErrorCodeKey,
  message: string,
  opts?: { status?: number; details?: unknown }
): CollectorError {
  const err = new Error(message) as CollectorError
  err.code = code
  if (opts?.status !== undefined) err.status = opts.status
  if (opts?.details !== undefined) err.details = opts.details
  return err
}

export function isCollectorError(err: unknown): err is CollectorError {
  return (
    err instanceof Error &&
    'code' in err &&
    Object.values<unknown>(CollectorErrorCode).includes(err.code)
  )
}
