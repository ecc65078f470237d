export { FileStore } from './file-store.js'
export { StoreErrorCode, makeStoreError } from './errors.js'
export type { StoreError } from './errors.js'
export type {
  CsvRow,
  CsvValue,
  FileStoreConfig,
  JsonData,
  Logger,
  SaveCsvOptions
} from './types.js'
