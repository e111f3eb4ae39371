export type ErrorKind =
  | 'NotFound'
  | 'ParseError'
  | 'DuplicateName'
  | 'InvalidInput'
  | 'UnknownSourceProfile'
  | 'WriteError'
  | 'SourceFileMissing'
  | 'CannotRemoveActive'

export class ProfileManagerError extends Error {
  readonly kind: ErrorKind

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ProfileManagerError'
    this.kind = kind
  }
}

export const isProfileManagerError = (err: unknown, kind?: ErrorKind): err is ProfileManagerError =>
  err instanceof ProfileManagerError && (kind === undefined || err.kind === kind)

export const describeError = (err: unknown): string => (err instanceof Error ? err.message : String(err))
