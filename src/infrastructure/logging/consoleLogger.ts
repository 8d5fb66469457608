/**
 * Infrastructure Layer - Console Logger
 *
 * Bracket-tagged console output (`[Runner] message`) filtered by a minimum
 * level. Warnings and errors go to stderr, the rest to stdout.
 */

import { LOG_LEVELS, type Logger, type LogLevel } from '../../core/ports/logger.js'

export type LogSink = {
  log: (message: string, ...details: unknown[]) => void
  error: (message: string, ...details: unknown[]) => void
}

export class ConsoleLogger implements Logger {
  readonly #tag: string
  readonly #minRank: number
  readonly #minLevel: LogLevel
  readonly #sink: LogSink

  constructor(opts: { tag: string; level?: LogLevel; sink?: LogSink }) {
    this.#tag = opts.tag
    this.#minLevel = opts.level ?? 'info'
    this.#minRank = LOG_LEVELS.indexOf(this.#minLevel)
    this.#sink = opts.sink ?? console
  }

  debug(message: string, ...details: unknown[]): void {
    this.#write('debug', message, details)
  }

  info(message: string, ...details: unknown[]): void {
    this.#write('info', message, details)
  }

  warn(message: string, ...details: unknown[]): void {
    this.#write('warn', message, details)
  }

  error(message: string, ...details: unknown[]): void {
    this.#write('error', message, details)
  }

  child(tag: string): Logger {
    return new ConsoleLogger({ tag: `${this.#tag}:${tag}`, level: this.#minLevel, sink: this.#sink })
  }

  #write(level: LogLevel, message: string, details: unknown[]): void {
    if (LOG_LEVELS.indexOf(level) < this.#minRank) return
    const line = `[${this.#tag}] ${message}`
    if (level === 'warn' || level === 'error') {
      this.#sink.error(line, ...details)
    } else {
      this.#sink.log(line, ...details)
    }
  }
}
