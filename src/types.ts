export interface Config {
  baseCredentialsFile: string
  credentialsFile: string
  configFile: string
  masterProfile?: string
  debug: boolean
}

export type ProfileKind = 'credentials' | 'role'

export interface ProfileSummary {
  name: string
  kind: ProfileKind
  active: boolean
  valid: boolean
  inCredentials: boolean
  inConfig: boolean
  region?: string
  roleArn?: string
  sourceProfile?: string
}

export interface CredentialsProfileInput {
  name: string
  accessKeyId: string
  secretAccessKey: string
  sessionToken?: string
  region?: string
}

export interface RoleProfileInput {
  name: string
  roleArn: string
  sourceProfile: string
  region?: string
  durationSeconds?: number
  externalId?: string
}

export interface CredentialsUpdate {
  profile?: string
  accessKeyId: string
  secretAccessKey: string
  sessionToken?: string
}

export interface ActiveSelection {
  profile: string
  previous: string | null
}

export interface EnvironmentSummary {
  name: string
  active: boolean
  valid: boolean
  region?: string
  regionDisplay?: string
  roleArn?: string
  description?: string
}

export interface CleanReport {
  removedSections: string[]
  removedInvalidLines: number
}

export interface ResetReport extends CleanReport {
  environment: string
}

export interface FileStatus {
  path: string
  exists: boolean
  readable: boolean
  valid: boolean
  error?: string
}

export interface StatusSnapshot {
  activeProfile: string | null
  activeEnvironment: string | null
  inSync: boolean
  files: {
    base: FileStatus
    credentials: FileStatus
    config: FileStatus
  }
  profileCount: number
  environmentCount: number
  defaultAccessKey?: string
  awsProfileVariable?: string
}
