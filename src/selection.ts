import { IniFile } from './ini'

export const DEFAULT_SECTION = 'default'

export const CREDENTIAL_KEYS = ['aws_access_key_id', 'aws_secret_access_key', 'aws_session_token'] as const

export const ROLE_KEYS = [
  'role_arn',
  'source_profile',
  'external_id',
  'duration_seconds',
  'mfa_serial',
  'role_session_name',
] as const

// Preferences are overwritten when the source has them and kept otherwise.
export const PREFERENCE_KEYS = ['region', 'output'] as const

type Values = Record<string, string>

export interface AwsFiles {
  credentials: IniFile
  config: IniFile
}

export const configSectionName = (profile: string): string =>
  profile === DEFAULT_SECTION ? DEFAULT_SECTION : `profile ${profile}`

/**
 * Sets each of `keys` on `target` from `source`, deleting the ones `source` lacks.
 * Keys outside the list are left alone.
 */
export const copyKeys = (file: IniFile, target: string, source: Values, keys: readonly string[]): void => {
  file.ensureSection(target)
  for (const key of keys) {
    const value = source[key]
    if (value !== undefined) {
      file.set(target, key, value)
    } else {
      file.delete(target, key)
    }
  }
}

/** Like copyKeys, but keys missing from `source` keep their current value. */
export const overlayKeys = (file: IniFile, target: string, source: Values, keys: readonly string[]): void => {
  file.ensureSection(target)
  for (const key of keys) {
    const value = source[key]
    if (value !== undefined) file.set(target, key, value)
  }
}

export const pick = (values: Values, keys: readonly string[]): Values => {
  const picked: Values = {}
  for (const key of keys) {
    if (values[key] !== undefined) picked[key] = values[key]
  }
  return picked
}

/** Profile names across both files, `default` excluded, sorted. */
export const profileNames = (files: AwsFiles): string[] => {
  const names = new Set<string>()
  for (const name of files.credentials.sectionNames()) {
    if (name !== DEFAULT_SECTION) names.add(name)
  }
  for (const name of files.config.sectionNames()) {
    if (name.startsWith('profile ')) {
      const profile = name.slice('profile '.length).trim()
      if (profile && profile !== DEFAULT_SECTION) names.add(profile)
    }
  }
  return [...names].sort((a, b) => a.localeCompare(b))
}

export const profileMatchesDefault = (files: AwsFiles, name: string): boolean => {
  const creds = files.credentials.getSection(name)
  const config = files.config.getSection(configSectionName(name))
  const defaultCreds = files.credentials.getSection(DEFAULT_SECTION) ?? {}
  const defaultConfig = files.config.getSection(DEFAULT_SECTION) ?? {}

  if (!creds && !config?.role_arn) return false

  if (creds) {
    if (!creds.aws_access_key_id || creds.aws_access_key_id !== defaultCreds.aws_access_key_id) return false
    if (creds.aws_secret_access_key !== defaultCreds.aws_secret_access_key) return false
  }

  if (config?.role_arn !== defaultConfig.role_arn) return false
  if (config?.role_arn && config.source_profile !== defaultConfig.source_profile) return false

  return true
}

export const findActiveProfile = (files: AwsFiles): string | null =>
  profileNames(files).find((name) => profileMatchesDefault(files, name)) ?? null

export const environmentNames = (base: IniFile): string[] =>
  base.sectionNames().filter((name) => name !== DEFAULT_SECTION)

/** An environment's section laid over the base file's `[default]` section. */
export const resolveEnvironment = (base: IniFile, name: string): Values | undefined => {
  if (name === DEFAULT_SECTION) return undefined
  const section = base.getSection(name)
  if (!section) return undefined
  return { ...(base.getSection(DEFAULT_SECTION) ?? {}), ...section }
}

export const environmentConfigValues = (environment: Values, masterProfile?: string): Values => {
  const values = pick(environment, [...PREFERENCE_KEYS, ...ROLE_KEYS])
  if (values.role_arn && !values.source_profile && masterProfile) {
    values.source_profile = masterProfile
  }
  return values
}

export const environmentMatchesDefault = (files: AwsFiles, environment: Values): boolean => {
  const defaultCreds = files.credentials.getSection(DEFAULT_SECTION) ?? {}
  const defaultConfig = files.config.getSection(DEFAULT_SECTION) ?? {}

  if (!environment.aws_access_key_id || environment.aws_access_key_id !== defaultCreds.aws_access_key_id) {
    return false
  }
  if (environment.role_arn !== defaultConfig.role_arn) return false
  return PREFERENCE_KEYS.every((key) => environment[key] === undefined || environment[key] === defaultConfig[key])
}

export const findActiveEnvironment = (files: AwsFiles, base: IniFile): string | null =>
  environmentNames(base).find((name) => {
    const environment = resolveEnvironment(base, name)
    return environment !== undefined && environmentMatchesDefault(files, environment)
  }) ?? null

export const environmentInSync = (files: AwsFiles, environment: Values, masterProfile?: string): boolean => {
  const defaultCreds = files.credentials.getSection(DEFAULT_SECTION) ?? {}
  const defaultConfig = files.config.getSection(DEFAULT_SECTION) ?? {}
  const expectedConfig = environmentConfigValues(environment, masterProfile)

  return (
    CREDENTIAL_KEYS.every((key) => environment[key] === defaultCreds[key]) &&
    ROLE_KEYS.every((key) => expectedConfig[key] === defaultConfig[key]) &&
    PREFERENCE_KEYS.every((key) => expectedConfig[key] === undefined || expectedConfig[key] === defaultConfig[key])
  )
}
