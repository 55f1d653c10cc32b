/**
 * ProgressLog - Everything the notifier tells the pushing user
 *
 * Lines are written to the hook's output as they happen and kept in order,
 * printed or not, so a failure report can carry the full transcript.
 */

export type LineWriter = (line: string) => void

export type ProgressLogOptions = {
  debug?: boolean
  write?: LineWriter
  /** Lines recorded before anything else, never printed */
  header?: string[]
}

const PREFIX = '[tracker]'
const DEBUG_PREFIX = '[tracker:debug]'
const ERROR_PREFIX = '[tracker:error]'
const RULE = '-'.repeat(60)

const writeStdout: LineWriter = (line) => {
  process.stdout.write(`${line}\n`)
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys)
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, entry]) => [key, sortKeys(entry)])
    )
  }
  return value
}

export class ProgressLog {
  private readonly lines: string[]
  private readonly write: LineWriter
  private debugEnabled: boolean

  constructor(options: ProgressLogOptions = {}) {
    this.lines = [...(options.header ?? [])]
    this.write = options.write ?? writeStdout
    this.debugEnabled = options.debug ?? false
  }

  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled
  }

  progress(message: string): void {
    this.emit(PREFIX, message, true)
  }

  error(message: string): void {
    this.emit(ERROR_PREFIX, message, true)
  }

  debug(message: string): void {
    this.emit(DEBUG_PREFIX, message, this.debugEnabled)
  }

  /**
   * Debug dump of a request or reply, keys sorted, four-space indent.
   */
  debugJson(data: unknown): void {
    this.debug(JSON.stringify(sortKeys(data), null, 4))
  }

  /**
   * Output of the server-side update, framed by rules.
   */
  hook(output: string): void {
    this.record(`${PREFIX} ${RULE}`, true)
    this.emit(PREFIX, output, true)
    this.record(`${PREFIX} ${RULE}`, true)
  }

  /** The whole transcript, including lines that were not printed */
  text(): string {
    return this.lines.join('\n')
  }

  private emit(prefix: string, message: string, print: boolean): void {
    if (message === '') {
      return
    }
    for (const line of message.replace(/\r?\n$/, '').split(/\r?\n/)) {
      this.record(`${prefix} ${line}`, print)
    }
  }

  private record(line: string, print: boolean): void {
    this.lines.push(line)
    if (print) {
      this.write(line)
    }
  }
}
