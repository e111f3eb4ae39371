import { ErrorKind, isProfileManagerError } from './errors'

export interface MappedError {
  exitCode: number
  message: string
  suggestion?: string
}

const EXIT_CODES: Record<ErrorKind, number> = {
  InvalidInput: 2,
  DuplicateName: 2,
  UnknownSourceProfile: 2,
  CannotRemoveActive: 2,
  NotFound: 3,
  SourceFileMissing: 3,
  ParseError: 4,
  WriteError: 4,
}

const SUGGESTIONS: Partial<Record<ErrorKind, string>> = {
  NotFound: "Run 'awsprof list' or 'awsprof envs' to see what exists",
  SourceFileMissing: 'Point --base-file or AWSPROF_BASE_CREDENTIALS_FILE at your base credentials file',
  ParseError: "Fix the line above, or run 'awsprof clean' to drop malformed config entries",
  CannotRemoveActive: "Run 'awsprof switch <other-profile>' first",
  UnknownSourceProfile: "Create the source profile first with 'awsprof create'",
  WriteError: 'Check permissions and free space for the AWS directory',
}

export const mapError = (err: unknown): MappedError => {
  if (isProfileManagerError(err)) {
    return { exitCode: EXIT_CODES[err.kind], message: err.message, suggestion: SUGGESTIONS[err.kind] }
  }
  if (err instanceof Error) {
    return { exitCode: 1, message: err.message }
  }
  return { exitCode: 1, message: String(err) }
}
