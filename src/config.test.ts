import { getConfig } from './config'
import path from 'path'
import os from 'os'

describe('getConfig', () => {
  it('should default to the standard AWS locations', () => {
    expect(getConfig({})).toEqual({
      baseCredentialsFile: path.join(os.homedir(), '.awsprof', 'credentials'),
      credentialsFile: path.join(os.homedir(), '.aws', 'credentials'),
      configFile: path.join(os.homedir(), '.aws', 'config'),
      masterProfile: undefined,
      debug: false,
    })
  })

  it('should read overrides from the environment and expand ~', () => {
    const config = getConfig({
      AWSPROF_BASE_CREDENTIALS_FILE: '~/secrets/base',
      AWS_SHARED_CREDENTIALS_FILE: '/etc/aws/credentials',
      AWS_CONFIG_FILE: '/etc/aws/config',
      AWSPROF_MASTER_PROFILE: ' master ',
      AWSPROF_DEBUG: 'true',
    })

    expect(config).toEqual({
      baseCredentialsFile: path.join(os.homedir(), 'secrets', 'base'),
      credentialsFile: '/etc/aws/credentials',
      configFile: '/etc/aws/config',
      masterProfile: 'master',
      debug: true,
    })
  })

  it.each([
    ['', undefined],
    ['   ', undefined],
  ])('should ignore a blank master profile %j', (value, expected) => {
    expect(getConfig({ AWSPROF_MASTER_PROFILE: value }).masterProfile).toBe(expected)
  })

  it.each([
    ['1', true],
    ['true', true],
    ['yes', false],
    ['0', false],
  ])('should read AWSPROF_DEBUG=%s as %s', (value, expected) => {
    expect(getConfig({ AWSPROF_DEBUG: value }).debug).toBe(expected)
  })
})
