export type NetworkError = Error & {
  code: string
  path?: string
  details?: unknown
}

export const NetworkErrorCode = {
  INPUT_INVALID: 'INPUT_INVALID'
} as const

type NetworkErrorCodeKey = typeof NetworkErrorCode[keyof typeof NetworkErrorCode]

export function makeNetworkError(
  code: NetworkErrorCodeKey,
  message: string,
  path?: string,
  details?: unknown
): NetworkError {
  const err = new Error(message) as NetworkError
  err.code = code
  if (path) err.path = path
  if (details !== undefined) err.details = details
  return err
}
