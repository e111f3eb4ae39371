import chalk from 'chalk'

export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
}

// Everything goes to stderr; stdout carries command output only.
export const createConsoleLogger = (options: { verbose?: boolean } = {}): Logger => ({
  debug: (message) => {
    if (options.verbose) console.error(chalk.gray(`· ${message}`))
  },
  info: (message) => {
    if (options.verbose) console.error(chalk.blue(`ℹ ${message}`))
  },
  warn: (message) => console.error(chalk.yellow(`⚠ ${message}`)),
  error: (message) => console.error(chalk.red(`✗ ${message}`)),
})
