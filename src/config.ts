// src/config.ts
import path from 'path'
import os from 'os'
import { Config } from './types'

const expandHome = (filePath: string): string => {
  if (filePath === '~') return os.homedir()
  if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2))
  return filePath
}

const isTruthy = (value: string | undefined): boolean => value === '1' || value === 'true'

export const getConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const awsDir = path.join(os.homedir(), '.aws')
  const masterProfile = env.AWSPROF_MASTER_PROFILE?.trim()

  return {
    baseCredentialsFile: expandHome(
      env.AWSPROF_BASE_CREDENTIALS_FILE || path.join(os.homedir(), '.awsprof', 'credentials'),
    ),
    credentialsFile: expandHome(env.AWS_SHARED_CREDENTIALS_FILE || path.join(awsDir, 'credentials')),
    configFile: expandHome(env.AWS_CONFIG_FILE || path.join(awsDir, 'config')),
    masterProfile: masterProfile ? masterProfile : undefined,
    debug: isTruthy(env.AWSPROF_DEBUG),
  }
}
