#!/usr/bin/env node

import { Command } from 'commander'
import chalk from 'chalk'
import * as readline from 'readline'
import { AwsProfileManager, createConsoleLogger } from './aws-manager'
import { getConfig } from './config'
import { describeError } from './errors'
import { mapError } from './cli-errors'
import { Config, FileStatus } from './types'

export type GlobalOptions = {
  baseFile?: string
  credentialsFile?: string
  configFile?: string
  masterProfile?: string
  verbose?: boolean
}

export type ManagerFactory = (options: GlobalOptions) => AwsProfileManager

// Helper functions
const success = (message: string) => console.log(chalk.green(`✓ ${message}`))
const error = (message: string) => console.error(chalk.red(`✗ ${message}`))
const info = (message: string) => console.log(chalk.blue(`ℹ ${message}`))
const warn = (message: string) => console.log(chalk.yellow(`⚠ ${message}`))

const confirm = async (question: string): Promise<boolean> => {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout })
  try {
    const answer = await new Promise<string>((resolve) => {
      rl.question(chalk.yellow(`${question} Type "yes" to confirm: `), resolve)
    })
    return answer.toLowerCase() === 'yes'
  } finally {
    rl.close()
  }
}

const defaultFactory: ManagerFactory = (options) => {
  const config: Config = getConfig()
  if (options.baseFile) config.baseCredentialsFile = options.baseFile
  if (options.credentialsFile) config.credentialsFile = options.credentialsFile
  if (options.configFile) config.configFile = options.configFile
  if (options.masterProfile) config.masterProfile = options.masterProfile

  const logger = createConsoleLogger({ verbose: options.verbose || config.debug })
  return new AwsProfileManager(config, { logger })
}

const describeFile = (label: string, file: FileStatus): string => {
  let state: string
  if (!file.exists) state = chalk.red('missing')
  else if (!file.readable) state = chalk.red(`unreadable (${file.error})`)
  else if (!file.valid) state = chalk.yellow(`invalid (${file.error})`)
  else state = chalk.green('ok')
  return `  ${label}: ${file.path} ${state}`
}

export const createProgram = (factory: ManagerFactory = defaultFactory): Command => {
  const program = new Command()

  program
    .name('awsprof')
    .description('Switch AWS CLI profiles and environments')
    .version('0.1.0')
    .option('--base-file <path>', 'Base credentials file holding the environments')
    .option('--credentials-file <path>', 'AWS credentials file')
    .option('--config-file <path>', 'AWS config file')
    .option('--master-profile <name>', 'Credentials profile mirrored on every environment sync')
    .option('-v, --verbose', 'Log what is read and written')

  const action =
    <A extends unknown[]>(handler: (manager: AwsProfileManager, ...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await handler(factory(program.opts<GlobalOptions>()), ...args)
      } catch (err) {
        const mapped = mapError(err)
        error(mapped.message)
        if (mapped.suggestion) console.error(chalk.gray(`  ${mapped.suggestion}`))
        process.exitCode = mapped.exitCode
      }
    }

  program
    .command('status')
    .description('Show the active profile, environment and file health')
    .action(
      action(async (manager) => {
        const status = await manager.getStatus()

        const named = (value: string | null) => (value ? chalk.cyan(value) : chalk.gray('Unknown'))
        info(`Active profile: ${named(status.activeProfile)}`)
        info(`Active environment: ${named(status.activeEnvironment)}`)
        if (status.activeEnvironment && !status.inSync) {
          warn("Default credentials differ from the base file. Run 'awsprof refresh' to resync.")
        }
        if (status.defaultAccessKey) {
          info(`Default access key: ${status.defaultAccessKey}`)
        }
        if (status.awsProfileVariable) {
          warn(`AWS_PROFILE is set to '${status.awsProfileVariable}' and takes precedence over the default profile`)
        }

        console.log()
        console.log(describeFile('Base file', status.files.base))
        console.log(describeFile('Credentials', status.files.credentials))
        console.log(describeFile('Config', status.files.config))
        console.log()
        info(`${status.profileCount} profile(s), ${status.environmentCount} environment(s)`)
      }),
    )

  program
    .command('list')
    .description('List profiles from the credentials and config files')
    .action(
      action(async (manager) => {
        const profiles = await manager.listProfiles()
        if (profiles.length === 0) {
          info('No profiles found')
          return
        }

        console.log(chalk.cyan('Available profiles:'))
        for (const profile of profiles) {
          const kind = profile.kind === 'role' ? `role via ${profile.sourceProfile ?? '?'}` : 'credentials'
          const region = profile.region ? ` ${profile.region}` : ''
          const active = profile.active ? chalk.green(' (active)') : ''
          const incomplete = profile.valid ? '' : chalk.red(' (incomplete)')
          console.log(`  ${chalk.yellow(profile.name)} [${kind}]${region}${active}${incomplete}`)
        }
      }),
    )

  program
    .command('envs')
    .description('List environments from the base credentials file')
    .action(
      action(async (manager) => {
        const environments = await manager.describeEnvironments()
        if (environments.length === 0) {
          info('No environments found')
          return
        }

        console.log(chalk.cyan('Available environments:'))
        for (const environment of environments) {
          const active = environment.active ? chalk.green(' (active)') : ''
          const incomplete = environment.valid ? '' : chalk.red(' (missing keys)')
          const description = environment.description ? ` - ${environment.description}` : ''
          console.log(`  ${chalk.yellow(environment.name)}${description}${active}${incomplete}`)
          if (environment.region) console.log(`    Region: ${environment.region} (${environment.regionDisplay})`)
          if (environment.roleArn) console.log(`    Role: ${environment.roleArn}`)
        }
      }),
    )

  program
    .command('switch')
    .description('Copy a profile into the default profile')
    .argument('<profile>', 'Profile name')
    .action(
      action(async (manager, profile: string) => {
        const selection = await manager.switchProfile(profile)
        const from = selection.previous && selection.previous !== profile ? ` (was '${selection.previous}')` : ''
        success(`Switched to profile '${selection.profile}'${from}`)
      }),
    )

  program
    .command('use')
    .alias('sync')
    .description('Sync an environment from the base file into the default profile')
    .argument('<environment>', 'Environment name')
    .action(
      action(async (manager, environment: string) => {
        await manager.syncCredentials(environment)
        success(`Synced environment '${environment}' into the default profile`)
      }),
    )

  program
    .command('refresh')
    .description('Re-sync the active environment, discarding manual edits')
    .action(
      action(async (manager) => {
        const environment = await manager.forceRefresh()
        success(`Refreshed environment '${environment}'`)
      }),
    )

  program
    .command('create')
    .description('Create a credentials profile')
    .argument('<profile>', 'Profile name')
    .requiredOption('--access-key <id>', 'AWS access key id')
    .requiredOption('--secret-key <secret>', 'AWS secret access key')
    .option('--session-token <token>', 'AWS session token')
    .option('--region <region>', 'Default region written to the config file')
    .action(
      action(
        async (
          manager,
          profile: string,
          options: { accessKey: string; secretKey: string; sessionToken?: string; region?: string },
        ) => {
          await manager.createCredentialsProfile({
            name: profile,
            accessKeyId: options.accessKey,
            secretAccessKey: options.secretKey,
            sessionToken: options.sessionToken,
            region: options.region,
          })
          success(`Created profile '${profile}'`)
        },
      ),
    )

  program
    .command('create-role')
    .description('Create a role profile in the config file')
    .argument('<profile>', 'Profile name')
    .requiredOption('--role-arn <arn>', 'IAM role to assume')
    .requiredOption('--source-profile <name>', 'Profile whose credentials assume the role')
    .option('--region <region>', 'Default region')
    .option('--duration <seconds>', 'Session duration in seconds', (value: string) => Number(value))
    .option('--external-id <id>', 'External id required by the role')
    .action(
      action(
        async (
          manager,
          profile: string,
          options: { roleArn: string; sourceProfile: string; region?: string; duration?: number; externalId?: string },
        ) => {
          await manager.createRoleProfile({
            name: profile,
            roleArn: options.roleArn,
            sourceProfile: options.sourceProfile,
            region: options.region,
            durationSeconds: options.duration,
            externalId: options.externalId,
          })
          success(`Created role profile '${profile}'`)
        },
      ),
    )

  program
    .command('remove')
    .description('Remove a profile from both files')
    .argument('<profile>', 'Profile name')
    .action(
      action(async (manager, profile: string) => {
        await manager.removeProfile(profile)
        success(`Removed profile '${profile}'`)
      }),
    )

  program
    .command('update')
    .description('Set the keys of a credentials profile (default when omitted)')
    .argument('[profile]', 'Profile name', 'default')
    .requiredOption('--access-key <id>', 'AWS access key id')
    .requiredOption('--secret-key <secret>', 'AWS secret access key')
    .option('--session-token <token>', 'AWS session token')
    .action(
      action(
        async (manager, profile: string, options: { accessKey: string; secretKey: string; sessionToken?: string }) => {
          await manager.updateCredentials({
            profile,
            accessKeyId: options.accessKey,
            secretAccessKey: options.secretKey,
            sessionToken: options.sessionToken,
          })
          success(`Updated credentials for '${profile}'`)
        },
      ),
    )

  program
    .command('clean')
    .description('Remove malformed and orphaned sections from the config file')
    .action(
      action(async (manager) => {
        const report = await manager.cleanConfig()
        if (report.removedSections.length === 0 && report.removedInvalidLines === 0) {
          info('Config file is already clean')
          return
        }

        success(
          `Removed ${report.removedSections.length} section(s) and ${report.removedInvalidLines} malformed line(s)`,
        )
        report.removedSections.forEach((section) => info(`  - [${section}]`))
      }),
    )

  program
    .command('reset')
    .description('Clean the config file and re-sync an environment from the base file')
    .argument('[environment]', 'Environment to sync (defaults to the active one)')
    .option('--force', 'Skip the confirmation prompt (for non-interactive use)')
    .action(
      action(async (manager, environment: string | undefined, options: { force?: boolean }) => {
        if (!options.force) {
          if (!process.stdin.isTTY) {
            error('Cannot proceed: reset rewrites the config file and the default credentials')
            console.error(chalk.gray('  In non-interactive environments, use --force to confirm'))
            process.exitCode = 1
            return
          }
          if (!(await confirm('Reset rewrites the config file and the default credentials.'))) {
            info('Operation cancelled.')
            return
          }
        }

        const report = await manager.forceCleanReset(environment)
        success(`Reset to environment '${report.environment}'`)
        report.removedSections.forEach((section) => info(`  - removed [${section}]`))
      }),
    )

  program
    .command('clean-expired')
    .description('Remove expired temporary credentials from the credentials file')
    .action(
      action(async (manager) => {
        const removed = await manager.cleanExpiredCredentials()
        if (removed.length === 0) {
          info('No expired credentials found')
          return
        }
        success(`Removed ${removed.length} expired profile(s): ${removed.join(', ')}`)
      }),
    )

  return program
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      error(describeError(err))
      process.exitCode = 1
    })
}
