export type Logger = {
  debug?: (message: string, meta?: Record<string, unknown>) => void
  info?: (message: string, meta?: Record<string, unknown>) => void
  warn?: (message: string, meta?: Record<string, unknown>) => void
  error?: (message: string, meta?: Record<string, unknown>) => void
}

export type CsvValue = string | number | boolean | null | undefined

export type CsvRow = Record<string, CsvValue>

export type SaveCsvOptions = {
  columns?: readonly string[]
  keepEmpty?: boolean
}

export type JsonData = unknown[] | Record<string, unknown>

export type FileStoreConfig = {
  baseDir?: string
  logger?: Logger
}
