import { IniFile } from './ini'
import { Storage, loadAwsFiles } from './storage'
import { ProfileManagerError, isProfileManagerError } from './errors'
import { Logger, silentLogger } from './logger'
import { regionDisplayName } from './regions'
import { CleanReport, Config, EnvironmentSummary, ResetReport } from './types'
import {
  CREDENTIAL_KEYS,
  DEFAULT_SECTION,
  PREFERENCE_KEYS,
  ROLE_KEYS,
  configSectionName,
  copyKeys,
  environmentConfigValues,
  environmentNames,
  findActiveEnvironment,
  overlayKeys,
  pick,
  resolveEnvironment,
} from './selection'

// Sections the AWS CLI reads from the config file besides [default].
const CONFIG_SECTION_PATTERN = /^(?:profile|sso-session|services) \S/
const CONFIG_SINGLETON_SECTIONS = new Set([DEFAULT_SECTION, 'plugins', 'preview'])

// Keys that let a config-only profile obtain credentials without a credentials file section.
const CREDENTIAL_SOURCE_KEYS = [
  'role_arn',
  'credential_process',
  'credential_source',
  'sso_session',
  'sso_start_url',
  'web_identity_token_file',
]

interface EnvironmentValues {
  credentials: Record<string, string>
  config: Record<string, string>
}

const hasKeys = (environment: Record<string, string>): boolean =>
  Boolean(environment.aws_access_key_id && environment.aws_secret_access_key)

export class EnvironmentRegistry {
  private config: Config
  private storage: Storage
  private logger: Logger

  constructor(config: Config, storage: Storage, logger: Logger = silentLogger) {
    this.config = config
    this.storage = storage
    this.logger = logger
  }

  loadBase = async (): Promise<IniFile> => {
    const basePath = this.config.baseCredentialsFile
    if (!(await this.storage.exists(basePath))) {
      throw new ProfileManagerError('SourceFileMissing', `Base credentials file not found: ${basePath}`)
    }

    try {
      return await this.storage.load(basePath)
    } catch (err) {
      if (isProfileManagerError(err, 'NotFound')) {
        throw new ProfileManagerError('SourceFileMissing', err.message, { cause: err })
      }
      throw err
    }
  }

  listEnvironments = async (): Promise<string[]> => {
    return environmentNames(await this.loadBase())
  }

  describeEnvironments = async (): Promise<EnvironmentSummary[]> => {
    const base = await this.loadBase()
    const active = findActiveEnvironment(await loadAwsFiles(this.storage, this.config), base)

    return environmentNames(base).map((name) => {
      const environment = resolveEnvironment(base, name) ?? {}
      return {
        name,
        active: name === active,
        valid: hasKeys(environment),
        region: environment.region,
        regionDisplay: environment.region ? regionDisplayName(environment.region) : undefined,
        roleArn: environment.role_arn,
        description: environment.description,
      }
    })
  }

  /** Overwrites the credentials `[default]` (and the master profile, when configured) with the environment. */
  syncCredentials = async (name: string): Promise<void> => {
    const base = await this.loadBase()
    await this.apply(name, this.prepare(base, name))
  }

  /** Re-syncs whichever environment `default` currently matches, discarding manual edits. */
  forceRefresh = async (): Promise<string> => {
    const base = await this.loadBase()
    const active = findActiveEnvironment(await loadAwsFiles(this.storage, this.config), base)
    if (!active) {
      throw new ProfileManagerError('NotFound', 'No active environment to refresh. Sync an environment first.')
    }

    await this.apply(active, this.prepare(base, active))
    return active
  }

  /**
   * Drops malformed lines, sections the AWS CLI does not read, and profile sections nothing can
   * supply credentials for. Running it again on its own output changes nothing.
   */
  cleanConfig = async (): Promise<CleanReport> => {
    const report: CleanReport = { removedSections: [], removedInvalidLines: 0 }
    if (!(await this.storage.exists(this.config.configFile))) {
      this.logger.debug(`${this.config.configFile} does not exist, nothing to clean`)
      return report
    }

    const config = await this.storage.load(this.config.configFile, { strict: false })
    const credentials = await this.storage.loadOrEmpty(this.config.credentialsFile)

    report.removedInvalidLines = config.removeInvalidLines()

    for (const name of config.sectionNames()) {
      if (!CONFIG_SINGLETON_SECTIONS.has(name) && !CONFIG_SECTION_PATTERN.test(name)) {
        config.removeSection(name)
        report.removedSections.push(name)
      }
    }

    // Removing a profile can orphan role profiles sourcing from it, so repeat until stable.
    let changed = true
    while (changed) {
      changed = false
      for (const name of config.sectionNames()) {
        if (!name.startsWith('profile ')) continue

        const profile = name.slice('profile '.length).trim()
        if (credentials.hasSection(profile)) continue

        const values = config.getSection(name) ?? {}
        const source = values.source_profile
        const orphaned =
          !CREDENTIAL_SOURCE_KEYS.some((key) => values[key] !== undefined) ||
          (source !== undefined && !credentials.hasSection(source) && !config.hasSection(configSectionName(source)))

        if (orphaned) {
          config.removeSection(name)
          report.removedSections.push(name)
          changed = true
        }
      }
    }

    if (report.removedInvalidLines > 0 || report.removedSections.length > 0) {
      await this.storage.save(config, this.config.configFile)
      const { removedSections, removedInvalidLines } = report
      this.logger.info(
        `Cleaned ${this.config.configFile}: removed ${removedSections.length} section(s)` +
          ` and ${removedInvalidLines} malformed line(s)`,
      )
    }

    return report
  }

  /**
   * cleanConfig followed by a sync from the base file: `name`, else the environment that was
   * active, else the first usable one.
   */
  forceCleanReset = async (name?: string): Promise<ResetReport> => {
    const base = await this.loadBase()
    const files = await loadAwsFiles(this.storage, this.config, { strict: false })

    const target =
      name ??
      findActiveEnvironment(files, base) ??
      environmentNames(base).find((candidate) => hasKeys(resolveEnvironment(base, candidate) ?? {}))
    if (!target) {
      throw new ProfileManagerError('NotFound', `No usable environment in ${this.config.baseCredentialsFile}`)
    }

    const values = this.prepare(base, target)
    const report = await this.cleanConfig()
    await this.apply(target, values)

    return { ...report, environment: target }
  }

  private prepare = (base: IniFile, name: string): EnvironmentValues => {
    const environment = resolveEnvironment(base, name)
    if (!environment) {
      throw new ProfileManagerError('NotFound', `Environment '${name}' not found in ${this.config.baseCredentialsFile}`)
    }
    if (!hasKeys(environment)) {
      throw new ProfileManagerError(
        'InvalidInput',
        `Environment '${name}' needs aws_access_key_id and aws_secret_access_key`,
      )
    }

    const config = environmentConfigValues(environment, this.config.masterProfile)
    if (config.role_arn && !config.source_profile) {
      throw new ProfileManagerError(
        'InvalidInput',
        `Environment '${name}' has a role_arn but no source_profile, and no master profile is configured`,
      )
    }

    return { credentials: pick(environment, CREDENTIAL_KEYS), config }
  }

  private apply = async (name: string, values: EnvironmentValues): Promise<void> => {
    const files = await loadAwsFiles(this.storage, this.config)

    copyKeys(files.credentials, DEFAULT_SECTION, values.credentials, CREDENTIAL_KEYS)
    if (this.config.masterProfile) {
      copyKeys(files.credentials, this.config.masterProfile, values.credentials, CREDENTIAL_KEYS)
    }
    await this.storage.save(files.credentials, this.config.credentialsFile)

    if (Object.keys(values.config).length > 0 || files.config.hasSection(DEFAULT_SECTION)) {
      copyKeys(files.config, DEFAULT_SECTION, values.config, ROLE_KEYS)
      overlayKeys(files.config, DEFAULT_SECTION, values.config, PREFERENCE_KEYS)
      await this.storage.save(files.config, this.config.configFile)
    }

    this.logger.info(`Synced environment '${name}' into the default profile`)
  }
}
