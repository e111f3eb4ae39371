import { Storage, loadAwsFiles } from './storage'
import { ProfileManagerError } from './errors'
import { Logger, silentLogger } from './logger'
import {
  ActiveSelection,
  Config,
  CredentialsProfileInput,
  CredentialsUpdate,
  ProfileSummary,
  RoleProfileInput,
} from './types'
import {
  AwsFiles,
  CREDENTIAL_KEYS,
  DEFAULT_SECTION,
  PREFERENCE_KEYS,
  ROLE_KEYS,
  configSectionName,
  copyKeys,
  findActiveProfile,
  overlayKeys,
  profileMatchesDefault,
  profileNames,
} from './selection'

const ROLE_ARN_PATTERN = /^arn:[\w-]+:iam::[^:]*:role\/.+$/

// Expiry stamps written next to temporary credentials by common credential helpers.
const EXPIRY_KEYS = ['x_security_token_expires', 'aws_expiration', 'expiration']

export const validateProfileName = (name: string, options: { allowDefault?: boolean } = {}): void => {
  if (!name || name !== name.trim() || /[[\]]/.test(name)) {
    throw new ProfileManagerError('InvalidInput', `Invalid profile name '${name}'`)
  }
  if (name === DEFAULT_SECTION && !options.allowDefault) {
    throw new ProfileManagerError('InvalidInput', `'${DEFAULT_SECTION}' is reserved for the active profile`)
  }
}

const requireValue = (value: string | undefined, label: string): string => {
  const trimmed = value?.trim()
  if (!trimmed) {
    throw new ProfileManagerError('InvalidInput', `${label} is required`)
  }
  return trimmed
}

const profileExists = (files: AwsFiles, name: string): boolean =>
  files.credentials.hasSection(name) || files.config.hasSection(configSectionName(name))

const summarize = (files: AwsFiles, name: string, activeName: string | null): ProfileSummary => {
  const creds = files.credentials.getSection(name)
  const config = files.config.getSection(configSectionName(name))
  const kind = config?.role_arn ? 'role' : 'credentials'

  return {
    name,
    kind,
    active: name === activeName,
    valid:
      kind === 'role'
        ? Boolean(config?.source_profile)
        : Boolean(creds?.aws_access_key_id && creds?.aws_secret_access_key),
    inCredentials: creds !== undefined,
    inConfig: config !== undefined,
    region: config?.region,
    roleArn: config?.role_arn,
    sourceProfile: config?.source_profile,
  }
}

export class ProfileRegistry {
  private config: Config
  private storage: Storage
  private logger: Logger

  constructor(config: Config, storage: Storage, logger: Logger = silentLogger) {
    this.config = config
    this.storage = storage
    this.logger = logger
  }

  listProfiles = async (): Promise<ProfileSummary[]> => {
    const files = await loadAwsFiles(this.storage, this.config)
    const activeName = findActiveProfile(files)
    return profileNames(files).map((name) => summarize(files, name, activeName))
  }

  createCredentialsProfile = async (input: CredentialsProfileInput): Promise<ProfileSummary> => {
    validateProfileName(input.name)
    const accessKeyId = requireValue(input.accessKeyId, 'Access key id')
    const secretAccessKey = requireValue(input.secretAccessKey, 'Secret access key')

    const files = await loadAwsFiles(this.storage, this.config)
    if (profileExists(files, input.name)) {
      throw new ProfileManagerError('DuplicateName', `Profile '${input.name}' already exists`)
    }

    files.credentials.set(input.name, 'aws_access_key_id', accessKeyId)
    files.credentials.set(input.name, 'aws_secret_access_key', secretAccessKey)
    if (input.sessionToken?.trim()) {
      files.credentials.set(input.name, 'aws_session_token', input.sessionToken.trim())
    }
    await this.storage.save(files.credentials, this.config.credentialsFile)

    if (input.region?.trim()) {
      files.config.set(configSectionName(input.name), 'region', input.region.trim())
      await this.storage.save(files.config, this.config.configFile)
    }

    this.logger.info(`Created credentials profile '${input.name}'`)
    return summarize(files, input.name, findActiveProfile(files))
  }

  createRoleProfile = async (input: RoleProfileInput): Promise<ProfileSummary> => {
    validateProfileName(input.name)
    const roleArn = requireValue(input.roleArn, 'Role ARN')
    const sourceProfile = requireValue(input.sourceProfile, 'Source profile')

    if (!ROLE_ARN_PATTERN.test(roleArn)) {
      throw new ProfileManagerError('InvalidInput', `'${roleArn}' is not an IAM role ARN`)
    }
    const duration = input.durationSeconds
    if (duration !== undefined && (!Number.isInteger(duration) || duration <= 0)) {
      throw new ProfileManagerError('InvalidInput', 'Duration must be a positive number of seconds')
    }

    const files = await loadAwsFiles(this.storage, this.config)
    if (profileExists(files, input.name)) {
      throw new ProfileManagerError('DuplicateName', `Profile '${input.name}' already exists`)
    }
    if (!profileExists(files, sourceProfile)) {
      throw new ProfileManagerError('UnknownSourceProfile', `Source profile '${sourceProfile}' does not exist`)
    }

    const section = configSectionName(input.name)
    files.config.set(section, 'role_arn', roleArn)
    files.config.set(section, 'source_profile', sourceProfile)
    if (input.region?.trim()) files.config.set(section, 'region', input.region.trim())
    if (duration !== undefined) files.config.set(section, 'duration_seconds', String(duration))
    if (input.externalId?.trim()) files.config.set(section, 'external_id', input.externalId.trim())

    await this.storage.save(files.config, this.config.configFile)

    this.logger.info(`Created role profile '${input.name}' assuming ${roleArn} from '${sourceProfile}'`)
    return summarize(files, input.name, findActiveProfile(files))
  }

  /**
   * Copies the profile into the `default` sections. Whatever `default` held before is overwritten.
   */
  switchProfile = async (name: string): Promise<ActiveSelection> => {
    validateProfileName(name)

    const files = await loadAwsFiles(this.storage, this.config)
    if (!profileExists(files, name)) {
      throw new ProfileManagerError('NotFound', `Profile '${name}' does not exist`)
    }

    const creds = files.credentials.getSection(name)
    const config = files.config.getSection(configSectionName(name))
    // SSO and preference-only sections cannot be represented in [default]
    if (!creds && !config?.role_arn) {
      throw new ProfileManagerError('InvalidInput', `Profile '${name}' has no credentials or role to switch to`)
    }

    const previous = findActiveProfile(files)

    if (creds) {
      copyKeys(files.credentials, DEFAULT_SECTION, creds, CREDENTIAL_KEYS)
      await this.storage.save(files.credentials, this.config.credentialsFile)
    }

    if (config) {
      copyKeys(files.config, DEFAULT_SECTION, config, ROLE_KEYS)
      overlayKeys(files.config, DEFAULT_SECTION, config, PREFERENCE_KEYS)
      await this.storage.save(files.config, this.config.configFile)
    } else if (files.config.hasSection(DEFAULT_SECTION)) {
      // A role left in [default] would shadow the keys just copied.
      copyKeys(files.config, DEFAULT_SECTION, {}, ROLE_KEYS)
      await this.storage.save(files.config, this.config.configFile)
    }

    this.logger.info(`Switched default profile to '${name}'`)
    return { profile: name, previous }
  }

  /** Refuses to remove the profile `default` currently matches, or the source of the role it assumes. */
  removeProfile = async (name: string): Promise<void> => {
    validateProfileName(name)

    const files = await loadAwsFiles(this.storage, this.config)
    if (!profileExists(files, name)) {
      throw new ProfileManagerError('NotFound', `Profile '${name}' does not exist`)
    }
    if (profileMatchesDefault(files, name)) {
      throw new ProfileManagerError(
        'CannotRemoveActive',
        `Cannot remove profile '${name}' while it is active. Switch to another profile first.`,
      )
    }
    if (files.config.get(DEFAULT_SECTION, 'source_profile') === name) {
      throw new ProfileManagerError(
        'CannotRemoveActive',
        `Profile '${name}' is the source_profile of the active role. Switch to another profile first.`,
      )
    }

    const dependents = profileNames(files).filter(
      (other) => files.config.get(configSectionName(other), 'source_profile') === name,
    )
    if (dependents.length > 0) {
      this.logger.warn(`Role profiles still using '${name}' as source: ${dependents.join(', ')}`)
    }

    if (files.credentials.removeSection(name)) {
      await this.storage.save(files.credentials, this.config.credentialsFile)
    }
    if (files.config.removeSection(configSectionName(name))) {
      await this.storage.save(files.config, this.config.configFile)
    }

    this.logger.info(`Removed profile '${name}'`)
  }

  /** Creates the credentials section when missing. A session token left out is removed. */
  updateCredentials = async (update: CredentialsUpdate): Promise<void> => {
    const profile = update.profile ?? DEFAULT_SECTION
    validateProfileName(profile, { allowDefault: true })

    const values: Record<string, string> = {
      aws_access_key_id: requireValue(update.accessKeyId, 'Access key id'),
      aws_secret_access_key: requireValue(update.secretAccessKey, 'Secret access key'),
    }
    if (update.sessionToken?.trim()) values.aws_session_token = update.sessionToken.trim()

    const credentials = await this.storage.loadOrEmpty(this.config.credentialsFile)
    copyKeys(credentials, profile, values, CREDENTIAL_KEYS)
    await this.storage.save(credentials, this.config.credentialsFile)

    this.logger.info(`Updated credentials for '${profile}'`)
  }

  /** Removes temporary credentials whose recorded expiry is before `now`. `default` is never removed. */
  cleanExpiredCredentials = async (now: Date = new Date()): Promise<string[]> => {
    if (!(await this.storage.exists(this.config.credentialsFile))) return []

    const credentials = await this.storage.load(this.config.credentialsFile)
    const removed: string[] = []

    for (const name of credentials.sectionNames()) {
      if (name === DEFAULT_SECTION) continue

      const values = credentials.getSection(name) ?? {}
      if (!values.aws_session_token) continue

      const expiryKey = EXPIRY_KEYS.find((key) => values[key] !== undefined)
      if (!expiryKey) continue

      const expiresAt = Date.parse(values[expiryKey])
      if (Number.isNaN(expiresAt)) {
        this.logger.debug(`Ignoring unparsable ${expiryKey} '${values[expiryKey]}' in [${name}]`)
        continue
      }

      if (expiresAt < now.getTime()) {
        credentials.removeSection(name)
        removed.push(name)
      }
    }

    if (removed.length > 0) {
      await this.storage.save(credentials, this.config.credentialsFile)
      this.logger.info(`Removed expired credentials: ${removed.join(', ')}`)
    }

    return removed
  }
}
