import { IniFile } from './ini'
import { Storage } from './storage'
import { describeError } from './errors'
import { Logger, silentLogger } from './logger'
import { Config, FileStatus, StatusSnapshot } from './types'
import {
  AwsFiles,
  DEFAULT_SECTION,
  environmentInSync,
  environmentNames,
  findActiveEnvironment,
  findActiveProfile,
  profileNames,
  resolveEnvironment,
} from './selection'

export const maskAccessKey = (key: string): string => `${key.slice(0, 4)}****`

/**
 * Read-only view over the three files. Works in a half-configured setup: a file that is
 * missing or malformed is reported in `files` and treated as empty.
 */
export class StatusReporter {
  private config: Config
  private storage: Storage
  private logger: Logger
  private env: NodeJS.ProcessEnv

  constructor(config: Config, storage: Storage, logger: Logger = silentLogger, env: NodeJS.ProcessEnv = process.env) {
    this.config = config
    this.storage = storage
    this.logger = logger
    this.env = env
  }

  getStatus = async (): Promise<StatusSnapshot> => {
    const [base, credentials, config] = await Promise.all([
      this.storage.probe(this.config.baseCredentialsFile),
      this.storage.probe(this.config.credentialsFile),
      this.storage.probe(this.config.configFile),
    ])

    const files: AwsFiles = {
      credentials: await this.readOrEmpty(credentials),
      config: await this.readOrEmpty(config),
    }
    const baseFile = await this.readOrEmpty(base)

    const activeEnvironment = findActiveEnvironment(files, baseFile)
    const environment = activeEnvironment ? resolveEnvironment(baseFile, activeEnvironment) : undefined
    const defaultAccessKey = files.credentials.get(DEFAULT_SECTION, 'aws_access_key_id')

    return {
      activeProfile: findActiveProfile(files),
      activeEnvironment,
      inSync: environment !== undefined && environmentInSync(files, environment, this.config.masterProfile),
      files: { base, credentials, config },
      profileCount: profileNames(files).length,
      environmentCount: environmentNames(baseFile).length,
      defaultAccessKey: defaultAccessKey ? maskAccessKey(defaultAccessKey) : undefined,
      awsProfileVariable: this.env.AWS_PROFILE,
    }
  }

  // Malformed files are still read leniently so the rest of the report stays useful.
  private readOrEmpty = async (status: FileStatus): Promise<IniFile> => {
    if (!status.readable) return new IniFile()
    try {
      return await this.storage.load(status.path, { strict: false })
    } catch (err) {
      this.logger.debug(`Status could not read ${status.path}: ${describeError(err)}`)
      return new IniFile()
    }
  }
}
