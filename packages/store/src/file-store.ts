import { promises as fs } from 'node:fs'
import path from 'node:path'
import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import { z } from 'zod'
import { makeStoreError, StoreErrorCode } from './errors.js'
import type { CsvRow, FileStoreConfig, JsonData, Logger, SaveCsvOptions } from './types.js'

const DEFAULT_BASE_DIR = path.resolve(process.cwd(), 'data')

const csvRecordsSchema = z.array(z.record(z.string()))

function log(
  logger: Logger | undefined,
  level: keyof Logger,
  message: string,
  meta?: Record<string, unknown>
): void {
  const fn = logger?.[level]
  if (fn) fn(message, meta)
}

function errorMessage(err: unknown, fallback: string): string {
  return err instanceof Error && err.message ? err.message : fallback
}

function isEmptyJson(data: JsonData): boolean {
  return Array.isArray(data) ? data.length === 0 : Object.keys(data).length === 0
}

/**
 * Flat-file datasets under one base directory. Saving an empty dataset
 * writes nothing and returns null unless a header-only CSV is requested.
 */
export class FileStore {
  private readonly baseDir: string
  private readonly logger: Logger | undefined

  constructor(opts?: FileStoreConfig) {
    this.baseDir = path.resolve(opts?.baseDir ?? DEFAULT_BASE_DIR)
    this.logger = opts?.logger
  }

  filePath(filename: string): string {
    return path.join(this.baseDir, filename)
  }

  async exists(filename: string): Promise<boolean> {
    try {
      await fs.access(this.filePath(filename))
      return true
    } catch {
      return false
    }
  }

  private async write(filename: string, payload: string): Promise<string> {
    const file = this.filePath(filename)
    try {
      await fs.mkdir(this.baseDir, { recursive: true })
      await fs.writeFile(file, payload, 'utf8')
      return file
    } catch (err) {
      throw makeStoreError(StoreErrorCode.WRITE_FAILED, errorMessage(err, 'Failed to write file'), {
        file
      })
    }
  }

  private async read(filename: string): Promise<string> {
    const file = this.filePath(filename)
    if (!(await this.exists(filename))) {
      throw makeStoreError(StoreErrorCode.FILE_NOT_FOUND, `File not found: ${file}`, { file })
    }
    try {
      return await fs.readFile(file, 'utf8')
    } catch (err) {
      throw makeStoreError(StoreErrorCode.READ_FAILED, errorMessage(err, 'Failed to read file'), {
        file
      })
    }
  }

  async saveCsv(
    rows: readonly CsvRow[],
    filename: string,
    opts?: SaveCsvOptions
  ): Promise<string | null> {
    const columns = opts?.columns ? [...opts.columns] : undefined
    let payload: string
    if (rows.length === 0) {
      if (!opts?.keepEmpty || !columns) {
        log(this.logger, 'debug', 'store skipped empty dataset', { file: filename })
        return null
      }
      payload = stringify([columns])
    } else {
      payload = stringify([...rows], {
        header: true,
        ...(columns ? { columns } : {}),
        cast: { boolean: (value: boolean) => (value ? 'true' : 'false') }
      })
    }

    const file = await this.write(filename, payload)
    log(this.logger, 'info', 'store wrote csv', { file, rows: rows.length })
    return file
  }

  async readCsv(filename: string): Promise<Array<Record<string, string>>> {
    const raw = await this.read(filename)
    try {
      const parsed: unknown = parse(raw, { columns: true, bom: true, skip_empty_lines: true })
      return csvRecordsSchema.parse(parsed)
    } catch (err) {
      throw makeStoreError(StoreErrorCode.READ_FAILED, errorMessage(err, 'Invalid csv file'), {
        file: this.filePath(filename)
      })
    }
  }

  async saveJson(data: JsonData, filename: string): Promise<string | null> {
    if (isEmptyJson(data)) {
      log(this.logger, 'debug', 'store skipped empty dataset', { file: filename })
      return null
    }
    const file = await this.write(filename, JSON.stringify(data, null, 2))
    log(this.logger, 'info', 'store wrote json', { file })
    return file
  }

  async readJson(filename: string): Promise<unknown> {
    const raw = await this.read(filename)
    try {
      return JSON.parse(raw)
    } catch (err) {
      throw makeStoreError(StoreErrorCode.READ_FAILED, errorMessage(err, 'Invalid json file'), {
        file: this.filePath(filename)
      })
    }
  }
}
