import { ProfileManagerError } from './errors'

type IniLine =
  | { kind: 'blank' | 'comment' | 'continuation'; raw: string }
  | { kind: 'entry'; raw: string; key: string; value: string }
  | { kind: 'invalid'; raw: string; reason: string }

interface IniSection {
  name: string
  header: string
  lines: IniLine[]
}

export interface IniIssue {
  line: number
  message: string
}

export interface ParseOptions {
  /** Throw a ParseError on the first malformed line instead of keeping it. Defaults to true. */
  strict?: boolean
  /** Name used in error messages, usually the file path. */
  source?: string
}

const SECTION_HEADER = /^\[([^\]]*)\]\s*(?:[#;].*)?$/

/**
 * An INI document that keeps every line it was parsed from.
 *
 * Lines nobody edits serialize exactly as read: comments, blank lines, spacing around `=`,
 * indented continuation lines (AWS nested settings) and the file's line ending. Edited entries
 * are written back as `key = value`. A file mixing `\n` and `\r\n` is written with `\r\n`
 * throughout.
 */
export class IniFile {
  private preamble: IniLine[] = []
  private sections: IniSection[] = []
  private eol = '\n'
  private trailingNewline = true
  private issueList: IniIssue[] = []

  static parse = (content: string, options: ParseOptions = {}): IniFile => {
    const strict = options.strict ?? true
    const source = options.source ?? '<input>'
    const file = new IniFile()

    if (content === '') return file

    file.eol = content.includes('\r\n') ? '\r\n' : '\n'
    const rawLines = content.split(/\r?\n/)
    file.trailingNewline = rawLines[rawLines.length - 1] === ''
    if (file.trailingNewline) rawLines.pop()

    let current: IniSection | undefined
    let insideDuplicate = false
    let afterEntry = false

    const push = (line: IniLine) => {
      if (current) current.lines.push(line)
      else file.preamble.push(line)
    }

    const reject = (index: number, raw: string, message: string) => {
      if (strict) {
        throw new ProfileManagerError('ParseError', `${source}:${index + 1}: ${message}`)
      }
      file.issueList.push({ line: index + 1, message })
      push({ kind: 'invalid', raw, reason: message })
      afterEntry = false
    }

    rawLines.forEach((raw, index) => {
      const trimmed = raw.trim()

      if (!trimmed) {
        push({ kind: 'blank', raw })
        afterEntry = false
        return
      }

      if (afterEntry && /^\s/.test(raw) && !trimmed.startsWith('[')) {
        push({ kind: 'continuation', raw })
        return
      }

      if (trimmed.startsWith('#') || trimmed.startsWith(';')) {
        push({ kind: 'comment', raw })
        afterEntry = false
        return
      }

      if (trimmed.startsWith('[')) {
        const match = SECTION_HEADER.exec(trimmed)
        if (!match) return reject(index, raw, 'malformed section header')

        const name = match[1].trim()
        if (!name) return reject(index, raw, 'empty section name')

        if (file.hasSection(name)) {
          reject(index, raw, `duplicate section [${name}]`)
          insideDuplicate = true
          return
        }

        current = { name, header: raw, lines: [] }
        file.sections.push(current)
        insideDuplicate = false
        afterEntry = false
        return
      }

      const equalIndex = raw.indexOf('=')
      if (equalIndex === -1) return reject(index, raw, 'expected key = value')

      const key = raw.substring(0, equalIndex).trim()
      const value = raw.substring(equalIndex + 1).trim()

      if (!key) return reject(index, raw, 'missing key before =')
      if (insideDuplicate) return reject(index, raw, `entry '${key}' belongs to a duplicate section`)
      if (!current) return reject(index, raw, `entry '${key}' appears before any section`)
      if (findEntry(current, key) !== -1) {
        return reject(index, raw, `duplicate key '${key}' in [${current.name}]`)
      }

      push({ kind: 'entry', raw, key, value })
      afterEntry = true
    })

    return file
  }

  get issues(): readonly IniIssue[] {
    return this.issueList
  }

  sectionNames = (): string[] => this.sections.map((section) => section.name)

  hasSection = (name: string): boolean => this.sections.some((section) => section.name === name)

  getSection = (name: string): Record<string, string> | undefined => {
    const section = this.findSection(name)
    if (!section) return undefined

    const values: Record<string, string> = {}
    for (const line of section.lines) {
      if (line.kind === 'entry') values[line.key] = line.value
    }
    return values
  }

  get = (sectionName: string, key: string): string | undefined => this.getSection(sectionName)?.[key]

  ensureSection = (name: string): void => {
    if (this.hasSection(name)) return

    const last = this.lastLine()
    if (last && last.kind !== 'blank') {
      const target = this.sections.length > 0 ? this.sections[this.sections.length - 1].lines : this.preamble
      target.push({ kind: 'blank', raw: '' })
    }

    this.sections.push({ name, header: `[${name}]`, lines: [] })
  }

  set = (sectionName: string, key: string, value: string): void => {
    this.ensureSection(sectionName)
    const section = this.requireSection(sectionName)
    const line: IniLine = { kind: 'entry', raw: `${key} = ${value}`, key, value }

    const index = findEntry(section, key)
    if (index === -1) {
      section.lines.splice(lastEntryEnd(section), 0, line)
      return
    }

    const existing = section.lines[index]
    if (existing.kind === 'entry' && existing.value === value && continuationCount(section, index) === 0) return

    section.lines.splice(index, 1 + continuationCount(section, index), line)
  }

  delete = (sectionName: string, key: string): boolean => {
    const section = this.findSection(sectionName)
    if (!section) return false

    const index = findEntry(section, key)
    if (index === -1) return false

    section.lines.splice(index, 1 + continuationCount(section, index))
    return true
  }

  removeSection = (name: string): boolean => {
    const index = this.sections.findIndex((section) => section.name === name)
    if (index === -1) return false

    this.sections.splice(index, 1)
    return true
  }

  removeInvalidLines = (): number => {
    let removed = 0
    const keep = (lines: IniLine[]): IniLine[] =>
      lines.filter((line) => {
        if (line.kind !== 'invalid') return true
        removed++
        return false
      })

    this.preamble = keep(this.preamble)
    for (const section of this.sections) {
      section.lines = keep(section.lines)
    }
    this.issueList = []
    return removed
  }

  toString = (): string => {
    const lines = [
      ...this.preamble.map((line) => line.raw),
      ...this.sections.flatMap((section) => [section.header, ...section.lines.map((line) => line.raw)]),
    ]

    if (lines.length === 0) return ''
    return lines.join(this.eol) + (this.trailingNewline ? this.eol : '')
  }

  private findSection = (name: string): IniSection | undefined =>
    this.sections.find((section) => section.name === name)

  private requireSection = (name: string): IniSection => {
    const section = this.findSection(name)
    if (!section) throw new ProfileManagerError('NotFound', `Section [${name}] does not exist`)
    return section
  }

  private lastLine = (): IniLine | { kind: 'header' } | undefined => {
    const lastSection = this.sections[this.sections.length - 1]
    if (lastSection) {
      return lastSection.lines[lastSection.lines.length - 1] ?? { kind: 'header' }
    }
    return this.preamble[this.preamble.length - 1]
  }
}

const findEntry = (section: IniSection, key: string): number =>
  section.lines.findIndex((line) => line.kind === 'entry' && line.key === key)

const continuationCount = (section: IniSection, entryIndex: number): number => {
  let count = 0
  while (section.lines[entryIndex + 1 + count]?.kind === 'continuation') count++
  return count
}

// Position just past the last entry (and its continuation lines) of a section.
const lastEntryEnd = (section: IniSection): number => {
  for (let i = section.lines.length - 1; i >= 0; i--) {
    const kind = section.lines[i].kind
    if (kind === 'entry' || kind === 'continuation') return i + 1
  }
  return 0
}
