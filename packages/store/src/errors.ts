export const StoreErrorCode = {
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  READ_FAILED: 'READ_FAILED',
  WRITE_FAILED: 'WRITE_FAILED'
} as const

type StoreErrorCodeKey = (typeof StoreErrorCode)[keyof typeof StoreErrorCode]

export type StoreError = Error & {
  code: StoreErrorCodeKey
  file?: string
}

export function makeStoreError(
  code: StoreErrorCodeKey,
  message: string,
  meta?: { file?: string }
): StoreError {
  const err = new Error(message) as StoreError
  err.code = code
  if (meta?.file) err.file = meta.file
  return err
}
