import { ProfileRegistry } from './profiles'
import { Storage } from './storage'
import { IniFile } from './ini'
import { Logger } from './logger'
import { Config } from './types'
import fs from 'fs-extra'
import path from 'path'
import os from 'os'

const CREDENTIALS = `[default]
aws_access_key_id = AKIA_ALPHA
aws_secret_access_key = SECRET_ALPHA

[alpha]
aws_access_key_id = AKIA_ALPHA
aws_secret_access_key = SECRET_ALPHA

[beta]
aws_access_key_id = AKIA_BETA
aws_secret_access_key = SECRET_BETA
aws_session_token = TOKEN_BETA
`

const CONFIG = `[default]
region = us-east-1
output = json

[profile beta]
region = eu-west-1

[profile deploy]
role_arn = arn:aws:iam::123456789012:role/Deploy
source_profile = beta
`

describe('ProfileRegistry', () => {
  let tempDir: string
  let config: Config
  let logger: jest.Mocked<Logger>
  let registry: ProfileRegistry

  const read = (filePath: string) => fs.readFile(filePath, 'utf-8')

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'awsprof-profiles-'))
    config = {
      baseCredentialsFile: path.join(tempDir, 'base'),
      credentialsFile: path.join(tempDir, 'credentials'),
      configFile: path.join(tempDir, 'config'),
      debug: false,
    }
    logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() }
    registry = new ProfileRegistry(config, new Storage(), logger)

    await fs.writeFile(config.credentialsFile, CREDENTIALS)
    await fs.writeFile(config.configFile, CONFIG)
  })

  afterEach(async () => {
    await fs.remove(tempDir)
  })

  describe('listProfiles', () => {
    it('should merge both files and mark the profile default matches', async () => {
      const profiles = await registry.listProfiles()

      expect(profiles).toEqual([
        {
          name: 'alpha',
          kind: 'credentials',
          active: true,
          valid: true,
          inCredentials: true,
          inConfig: false,
        },
        {
          name: 'beta',
          kind: 'credentials',
          active: false,
          valid: true,
          inCredentials: true,
          inConfig: true,
          region: 'eu-west-1',
        },
        {
          name: 'deploy',
          kind: 'role',
          active: false,
          valid: true,
          inCredentials: false,
          inConfig: true,
          roleArn: 'arn:aws:iam::123456789012:role/Deploy',
          sourceProfile: 'beta',
        },
      ])
    })

    it('should return nothing when neither file exists', async () => {
      await fs.remove(config.credentialsFile)
      await fs.remove(config.configFile)

      expect(await registry.listProfiles()).toEqual([])
    })

    it('should reject a malformed credentials file with ParseError', async () => {
      await fs.writeFile(config.credentialsFile, '[alpha\n')

      await expect(registry.listProfiles()).rejects.toMatchObject({ kind: 'ParseError' })
    })
  })

  describe('createCredentialsProfile', () => {
    it('should append the profile to both files without touching existing lines', async () => {
      const summary = await registry.createCredentialsProfile({
        name: 'gamma',
        accessKeyId: 'AKIA_GAMMA',
        secretAccessKey: 'SECRET_GAMMA',
        region: 'us-west-2',
      })

      expect(summary).toMatchObject({ name: 'gamma', kind: 'credentials', active: false, region: 'us-west-2' })
      expect(await read(config.credentialsFile)).toBe(
        `${CREDENTIALS}\n[gamma]\naws_access_key_id = AKIA_GAMMA\naws_secret_access_key = SECRET_GAMMA\n`,
      )
      expect(await read(config.configFile)).toBe(`${CONFIG}\n[profile gamma]\nregion = us-west-2\n`)

      const names = (await registry.listProfiles()).map((profile) => profile.name)
      expect(names.filter((name) => name === 'gamma')).toHaveLength(1)
    })

    it('should create the credentials file when it does not exist', async () => {
      await fs.remove(config.credentialsFile)

      await registry.createCredentialsProfile({
        name: 'gamma',
        accessKeyId: 'AKIA_GAMMA',
        secretAccessKey: 'SECRET_GAMMA',
        sessionToken: 'TOKEN_GAMMA',
      })

      expect(await read(config.credentialsFile)).toBe(
        '[gamma]\naws_access_key_id = AKIA_GAMMA\naws_secret_access_key = SECRET_GAMMA\n' +
          'aws_session_token = TOKEN_GAMMA\n',
      )
      expect(await read(config.configFile)).toBe(CONFIG)
    })

    it.each(['beta', 'deploy'])('should reject the existing name %s and leave the files unchanged', async (name) => {
      await expect(
        registry.createCredentialsProfile({ name, accessKeyId: 'AKIA_DUP', secretAccessKey: 'SECRET_DUP' }),
      ).rejects.toMatchObject({ kind: 'DuplicateName' })

      expect(await read(config.credentialsFile)).toBe(CREDENTIALS)
      expect(await read(config.configFile)).toBe(CONFIG)
    })

    it.each([
      ['default', 'AKIA_X', 'SECRET_X'],
      ['bad]name', 'AKIA_X', 'SECRET_X'],
      [' padded', 'AKIA_X', 'SECRET_X'],
      ['gamma', '', 'SECRET_X'],
      ['gamma', 'AKIA_X', '   '],
    ])('should reject name %j with InvalidInput', async (name, accessKeyId, secretAccessKey) => {
      await expect(registry.createCredentialsProfile({ name, accessKeyId, secretAccessKey })).rejects.toMatchObject({
        kind: 'InvalidInput',
      })
      expect(await read(config.credentialsFile)).toBe(CREDENTIALS)
    })
  })

  describe('createRoleProfile', () => {
    it('should write the role to the config file only', async () => {
      const summary = await registry.createRoleProfile({
        name: 'ops',
        roleArn: 'arn:aws:iam::123456789012:role/Ops',
        sourceProfile: 'alpha',
        durationSeconds: 3600,
      })

      expect(summary).toMatchObject({ name: 'ops', kind: 'role', valid: true, sourceProfile: 'alpha' })
      expect(await read(config.configFile)).toBe(
        `${CONFIG}\n[profile ops]\nrole_arn = arn:aws:iam::123456789012:role/Ops\n` +
          'source_profile = alpha\nduration_seconds = 3600\n',
      )
      expect(await read(config.credentialsFile)).toBe(CREDENTIALS)
    })

    it('should accept a role profile as the source', async () => {
      await registry.createRoleProfile({
        name: 'chained',
        roleArn: 'arn:aws:iam::123456789012:role/Chained',
        sourceProfile: 'deploy',
      })

      const chained = (await registry.listProfiles()).find((profile) => profile.name === 'chained')
      expect(chained?.sourceProfile).toBe('deploy')
    })

    it('should reject an unknown source profile and add nothing', async () => {
      await expect(
        registry.createRoleProfile({
          name: 'deploy-two',
          roleArn: 'arn:aws:iam::123:role/Deploy',
          sourceProfile: 'base',
        }),
      ).rejects.toMatchObject({ kind: 'UnknownSourceProfile' })

      expect(await read(config.configFile)).toBe(CONFIG)
    })

    it('should reject an existing name before checking the source', async () => {
      await expect(
        registry.createRoleProfile({ name: 'deploy', roleArn: 'arn:aws:iam::123:role/Deploy', sourceProfile: 'base' }),
      ).rejects.toMatchObject({ kind: 'DuplicateName' })
    })

    it.each([
      ['arn:aws:iam::123:user/bob', undefined],
      ['not-an-arn', undefined],
      ['arn:aws:iam::123:role/Deploy', 0],
      ['arn:aws:iam::123:role/Deploy', 1.5],
    ])('should reject role %j with duration %j', async (roleArn, durationSeconds) => {
      await expect(
        registry.createRoleProfile({ name: 'ops', roleArn, sourceProfile: 'alpha', durationSeconds }),
      ).rejects.toMatchObject({ kind: 'InvalidInput' })
    })
  })

  describe('switchProfile', () => {
    it('should copy credentials and preferences into default', async () => {
      const selection = await registry.switchProfile('beta')

      expect(selection).toEqual({ profile: 'beta', previous: 'alpha' })
      expect(await read(config.credentialsFile)).toBe(
        CREDENTIALS.replace(
          '[default]\naws_access_key_id = AKIA_ALPHA\naws_secret_access_key = SECRET_ALPHA\n',
          '[default]\naws_access_key_id = AKIA_BETA\naws_secret_access_key = SECRET_BETA\n' +
            'aws_session_token = TOKEN_BETA\n',
        ),
      )
      expect(await read(config.configFile)).toBe(CONFIG.replace('region = us-east-1', 'region = eu-west-1'))

      const active = (await registry.listProfiles()).filter((profile) => profile.active)
      expect(active.map((profile) => profile.name)).toEqual(['beta'])
    })

    it('should copy a role profile into the config default and back out again', async () => {
      await registry.switchProfile('deploy')

      const configFile = IniFile.parse(await read(config.configFile))
      expect(configFile.getSection('default')).toEqual({
        region: 'us-east-1',
        output: 'json',
        role_arn: 'arn:aws:iam::123456789012:role/Deploy',
        source_profile: 'beta',
      })
      expect(await read(config.credentialsFile)).toBe(CREDENTIALS)
      expect((await registry.listProfiles()).find((profile) => profile.active)?.name).toBe('deploy')

      expect(await registry.switchProfile('alpha')).toEqual({ profile: 'alpha', previous: 'deploy' })
      expect(await read(config.configFile)).toBe(CONFIG)
    })

    it('should reject an unknown profile with NotFound', async () => {
      await expect(registry.switchProfile('missing')).rejects.toMatchObject({ kind: 'NotFound' })
      expect(await read(config.credentialsFile)).toBe(CREDENTIALS)
    })

    it('should reject default itself', async () => {
      await expect(registry.switchProfile('default')).rejects.toMatchObject({ kind: 'InvalidInput' })
    })

    it.each([
      ['sso', 'sso_session = corp\nsso_account_id = 123456789012\nregion = eu-west-1\n'],
      ['regional', 'region = ap-southeast-2\n'],
    ])('should refuse %s, which has neither credentials nor a role', async (name, body) => {
      const withProfile = `${CONFIG}\n[profile ${name}]\n${body}`
      await fs.writeFile(config.configFile, withProfile)

      await expect(registry.switchProfile(name)).rejects.toMatchObject({
        kind: 'InvalidInput',
        message: `Profile '${name}' has no credentials or role to switch to`,
      })

      expect(await read(config.credentialsFile)).toBe(CREDENTIALS)
      expect(await read(config.configFile)).toBe(withProfile)
      expect((await registry.listProfiles()).find((profile) => profile.active)?.name).toBe('alpha')
    })
  })

  describe('removeProfile', () => {
    it('should remove the profile from both files and warn about dependent roles', async () => {
      await registry.removeProfile('beta')

      const names = (await registry.listProfiles()).map((profile) => profile.name)
      expect(names).toEqual(['alpha', 'deploy'])
      expect(IniFile.parse(await read(config.configFile)).hasSection('profile beta')).toBe(false)
      expect(logger.warn).toHaveBeenCalledWith("Role profiles still using 'beta' as source: deploy")

      await expect(registry.switchProfile('beta')).rejects.toMatchObject({ kind: 'NotFound' })
    })

    it('should refuse to remove the active profile', async () => {
      await expect(registry.removeProfile('alpha')).rejects.toMatchObject({ kind: 'CannotRemoveActive' })

      expect(await read(config.credentialsFile)).toBe(CREDENTIALS)
    })

    it('should refuse to remove the source of the active role', async () => {
      await registry.switchProfile('deploy')
      const configBefore = await read(config.configFile)

      await expect(registry.removeProfile('beta')).rejects.toMatchObject({
        kind: 'CannotRemoveActive',
        message: "Profile 'beta' is the source_profile of the active role. Switch to another profile first.",
      })

      expect(await read(config.credentialsFile)).toBe(CREDENTIALS)
      expect(await read(config.configFile)).toBe(configBefore)
    })

    it('should reject an unknown profile with NotFound', async () => {
      await expect(registry.removeProfile('missing')).rejects.toMatchObject({ kind: 'NotFound' })
    })
  })

  describe('updateCredentials', () => {
    it('should update default when no profile is named', async () => {
      await registry.updateCredentials({ accessKeyId: 'AKIA_NEW', secretAccessKey: 'SECRET_NEW' })

      const credentials = IniFile.parse(await read(config.credentialsFile))
      expect(credentials.getSection('default')).toEqual({
        aws_access_key_id: 'AKIA_NEW',
        aws_secret_access_key: 'SECRET_NEW',
      })
    })

    it('should drop a session token the update leaves out', async () => {
      await registry.updateCredentials({ profile: 'beta', accessKeyId: 'AKIA_BETA2', secretAccessKey: 'SECRET_BETA2' })

      const credentials = IniFile.parse(await read(config.credentialsFile))
      expect(credentials.getSection('beta')).toEqual({
        aws_access_key_id: 'AKIA_BETA2',
        aws_secret_access_key: 'SECRET_BETA2',
      })
    })

    it('should create a missing profile', async () => {
      await registry.updateCredentials({
        profile: 'fresh',
        accessKeyId: 'AKIA_FRESH',
        secretAccessKey: 'SECRET_FRESH',
        sessionToken: 'TOKEN_FRESH',
      })

      const credentials = IniFile.parse(await read(config.credentialsFile))
      expect(credentials.getSection('fresh')).toEqual({
        aws_access_key_id: 'AKIA_FRESH',
        aws_secret_access_key: 'SECRET_FRESH',
        aws_session_token: 'TOKEN_FRESH',
      })
    })

    it('should reject an empty secret', async () => {
      await expect(registry.updateCredentials({ accessKeyId: 'AKIA_NEW', secretAccessKey: '' })).rejects.toMatchObject(
        { kind: 'InvalidInput' },
      )
      expect(await read(config.credentialsFile)).toBe(CREDENTIALS)
    })
  })

  describe('cleanExpiredCredentials', () => {
    const TEMPORARY = `[default]
aws_access_key_id = AKIA_ALPHA
aws_secret_access_key = SECRET_ALPHA
aws_session_token = TOKEN_DEFAULT
x_security_token_expires = 2020-01-01T00:00:00Z

[old]
aws_access_key_id = AKIA_OLD
aws_secret_access_key = SECRET_OLD
aws_session_token = TOKEN_OLD
x_security_token_expires = 2024-01-01T00:00:00Z

[fresh]
aws_access_key_id = AKIA_FRESH
aws_secret_access_key = SECRET_FRESH
aws_session_token = TOKEN_FRESH
aws_expiration = 2030-01-01T00:00:00Z

[static]
aws_access_key_id = AKIA_STATIC
aws_secret_access_key = SECRET_STATIC
expiration = 2020-01-01T00:00:00Z

[weird]
aws_access_key_id = AKIA_WEIRD
aws_secret_access_key = SECRET_WEIRD
aws_session_token = TOKEN_WEIRD
expiration = someday
`

    it('should remove only expired temporary credentials', async () => {
      await fs.writeFile(config.credentialsFile, TEMPORARY)

      const removed = await registry.cleanExpiredCredentials(new Date('2025-06-01T00:00:00Z'))

      expect(removed).toEqual(['old'])
      expect(IniFile.parse(await read(config.credentialsFile)).sectionNames()).toEqual([
        'default',
        'fresh',
        'static',
        'weird',
      ])
    })

    it('should leave the file alone when nothing expired', async () => {
      await fs.writeFile(config.credentialsFile, TEMPORARY)

      expect(await registry.cleanExpiredCredentials(new Date('2023-01-01T00:00:00Z'))).toEqual([])
      expect(await read(config.credentialsFile)).toBe(TEMPORARY)
    })

    it('should return nothing when the credentials file does not exist', async () => {
      await fs.remove(config.credentialsFile)

      expect(await registry.cleanExpiredCredentials()).toEqual([])
    })
  })
})
