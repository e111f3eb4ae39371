import fs from 'fs-extra'
import path from 'path'
import { IniFile } from './ini'
import { ProfileManagerError, describeError } from './errors'
import { Logger, silentLogger } from './logger'
import { Config, FileStatus } from './types'
import { AwsFiles } from './selection'

export interface LoadOptions {
  strict?: boolean
}

export class Storage {
  private logger: Logger

  constructor(logger: Logger = silentLogger) {
    this.logger = logger
  }

  exists = async (filePath: string): Promise<boolean> => {
    return await fs.pathExists(filePath)
  }

  load = async (filePath: string, options: LoadOptions = {}): Promise<IniFile> => {
    if (!(await fs.pathExists(filePath))) {
      throw new ProfileManagerError('NotFound', `File not found: ${filePath}`)
    }

    let content: string
    try {
      content = await fs.readFile(filePath, 'utf-8')
    } catch (err) {
      throw new ProfileManagerError('NotFound', `Cannot read ${filePath}: ${describeError(err)}`, { cause: err })
    }

    return IniFile.parse(content, { strict: options.strict ?? true, source: filePath })
  }

  loadOrEmpty = async (filePath: string, options: LoadOptions = {}): Promise<IniFile> => {
    if (!(await fs.pathExists(filePath))) {
      this.logger.debug(`${filePath} does not exist yet, starting from an empty file`)
      return new IniFile()
    }
    return await this.load(filePath, options)
  }

  /**
   * Writes to a temporary file beside the target and renames it into place,
   * so the target holds either the old or the new content. A symlink at the
   * path is replaced by a regular file, and the result is always mode 0600.
   */
  save = async (file: IniFile, filePath: string): Promise<void> => {
    const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`)

    try {
      await fs.ensureDir(path.dirname(filePath))
      await fs.writeFile(tempPath, file.toString(), { encoding: 'utf-8', mode: 0o600 })
      await fs.rename(tempPath, filePath)
    } catch (err) {
      await this.discardTemp(tempPath)
      throw new ProfileManagerError('WriteError', `Failed to write ${filePath}: ${describeError(err)}`, {
        cause: err,
      })
    }

    this.logger.debug(`Wrote ${filePath}`)
  }

  probe = async (filePath: string): Promise<FileStatus> => {
    const status: FileStatus = { path: filePath, exists: false, readable: false, valid: false }

    try {
      status.exists = await fs.pathExists(filePath)
      if (!status.exists) return status

      const content = await fs.readFile(filePath, 'utf-8')
      status.readable = true
      IniFile.parse(content, { source: filePath })
      status.valid = true
    } catch (err) {
      status.error = describeError(err)
    }

    return status
  }

  private discardTemp = async (tempPath: string): Promise<void> => {
    try {
      await fs.remove(tempPath)
    } catch (err) {
      this.logger.debug(`Could not remove ${tempPath}: ${describeError(err)}`)
    }
  }
}

export const loadAwsFiles = async (storage: Storage, config: Config, options: LoadOptions = {}): Promise<AwsFiles> => ({
  credentials: await storage.loadOrEmpty(config.credentialsFile, options),
  config: await storage.loadOrEmpty(config.configFile, options),
})
