import { getConfig } from './config'
import { Storage } from './storage'
import { ProfileRegistry } from './profiles'
import { EnvironmentRegistry } from './environments'
import { StatusReporter } from './status'
import { Logger, silentLogger } from './logger'
import {
  ActiveSelection,
  CleanReport,
  Config,
  CredentialsProfileInput,
  CredentialsUpdate,
  EnvironmentSummary,
  ProfileSummary,
  ResetReport,
  RoleProfileInput,
  StatusSnapshot,
} from './types'

export * from './types'
export { ProfileManagerError, ErrorKind, isProfileManagerError } from './errors'
export { Logger, createConsoleLogger, silentLogger } from './logger'

interface Dependencies {
  logger: Logger
  env: NodeJS.ProcessEnv
}

/**
 * Entry point for callers (the CLI, or any other front end). Every method is one
 * load-modify-save cycle over the files it names and rejects with a ProfileManagerError.
 */
export class AwsProfileManager {
  readonly config: Config
  private profiles: ProfileRegistry
  private environments: EnvironmentRegistry
  private status: StatusReporter

  constructor(config: Partial<Config> = {}, deps: Partial<Dependencies> = {}) {
    const env = deps.env ?? process.env
    const logger = deps.logger ?? silentLogger
    const storage = new Storage(logger)

    this.config = { ...getConfig(env), ...config }
    this.profiles = new ProfileRegistry(this.config, storage, logger)
    this.environments = new EnvironmentRegistry(this.config, storage, logger)
    this.status = new StatusReporter(this.config, storage, logger, env)
  }

  listProfiles = async (): Promise<ProfileSummary[]> => {
    return await this.profiles.listProfiles()
  }

  createCredentialsProfile = async (input: CredentialsProfileInput): Promise<ProfileSummary> => {
    return await this.profiles.createCredentialsProfile(input)
  }

  createRoleProfile = async (input: RoleProfileInput): Promise<ProfileSummary> => {
    return await this.profiles.createRoleProfile(input)
  }

  switchProfile = async (name: string): Promise<ActiveSelection> => {
    return await this.profiles.switchProfile(name)
  }

  removeProfile = async (name: string): Promise<void> => {
    await this.profiles.removeProfile(name)
  }

  updateCredentials = async (update: CredentialsUpdate): Promise<void> => {
    await this.profiles.updateCredentials(update)
  }

  cleanExpiredCredentials = async (now?: Date): Promise<string[]> => {
    return await this.profiles.cleanExpiredCredentials(now)
  }

  listEnvironments = async (): Promise<string[]> => {
    return await this.environments.listEnvironments()
  }

  describeEnvironments = async (): Promise<EnvironmentSummary[]> => {
    return await this.environments.describeEnvironments()
  }

  syncCredentials = async (environment: string): Promise<void> => {
    await this.environments.syncCredentials(environment)
  }

  switchEnvironment = async (environment: string): Promise<void> => {
    await this.environments.syncCredentials(environment)
  }

  forceRefresh = async (): Promise<string> => {
    return await this.environments.forceRefresh()
  }

  cleanConfig = async (): Promise<CleanReport> => {
    return await this.environments.cleanConfig()
  }

  forceCleanReset = async (environment?: string): Promise<ResetReport> => {
    return await this.environments.forceCleanReset(environment)
  }

  getStatus = async (): Promise<StatusSnapshot> => {
    return await this.status.getStatus()
  }
}
