import { Writable } from 'node:stream'
import pino from 'pino'
import { z } from 'zod'
import type { Database } from '../db/client'
import { systemLogs } from '../db/schema'

const levelMap: Record<number, string> = {
  10: 'trace',
  20: 'debug',
  30: 'info',
  40: 'warn',
  50: 'error',
  60: 'fatal',
}

// ============================================================================
// Batched Logger - Accumulates logs and flushes every 5 seconds
// ============================================================================

export interface LogEntry {
  category: string
  source: string
  level: string
  msg: string
  time: Date
  details: Record<string, unknown>
}

const FLUSH_INTERVAL_MS = 5000 // Flush every 5 seconds
const MAX_BUFFER_SIZE = 100 // Or when buffer reaches 100 entries

// Fastify noise that is not worth a row
const IGNORED_MESSAGES = new Set(['incoming request', 'request completed'])

// Matches [CATEGORY] or [CATEGORY:extra]
const CATEGORY_PREFIX = /^\[([A-Z0-9]+)(?::[^\]]+)?\]\s*/

const LogLineSchema = z
  .object({
    level: z.union([z.number(), z.string()]),
    msg: z.string().default(''),
    time: z.number().optional(),
    source: z.string().optional(),
  })
  .passthrough()

/**
 * One pino JSON line to a `system_logs` row; null for lines without a
 * `[CATEGORY]` prefix. Throws on malformed JSON.
 */
export function parseLogLine(line: string): LogEntry | null {
  const parsed = LogLineSchema.safeParse(JSON.parse(line))
  if (!parsed.success) return null

  const { level, msg, time, source, ...details } = parsed.data
  const match = msg.match(CATEGORY_PREFIX)
  if (!match || IGNORED_MESSAGES.has(msg)) return null

  // pino's own bookkeeping fields are not details
  const { pid: _pid, hostname: _hostname, ...rest } = details

  return {
    category: match[1],
    source: source ?? 'SYSTEM',
    level: typeof level === 'number' ? (levelMap[level] ?? String(level)) : level,
    msg: msg.replace(CATEGORY_PREFIX, ''),
    time: new Date(time ?? Date.now()),
    details: rest,
  }
}

export interface DbLogSink {
  stream: Writable
  /** Stop the flush timer and write what is left */
  stop(): Promise<void>
}

/**
 * Writable stream that turns categorised pino lines into `system_logs` rows.
 * Lines without a `[CATEGORY]` prefix are dropped.
 */
export function createDbLogSink(db: Database): DbLogSink {
  const logBuffer: LogEntry[] = []
  let flushTimer: ReturnType<typeof setInterval> | null = null

  async function flushLogs(): Promise<void> {
    if (logBuffer.length === 0) return

    const logsToInsert = logBuffer.splice(0, logBuffer.length)
    try {
      await db.insert(systemLogs).values(logsToInsert)
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : 'Unknown error'
      process.stderr.write(`Failed to batch insert logs: ${errorMessage}\n`)
    }
  }

  function startFlushTimer(): void {
    if (flushTimer) return
    flushTimer = setInterval(() => void flushLogs(), FLUSH_INTERVAL_MS)
    // Don't block process exit
    flushTimer.unref()
  }

  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      try {
        const entry = parseLogLine(chunk.toString())
        if (entry) {
          logBuffer.push(entry)
          startFlushTimer()
          if (logBuffer.length >= MAX_BUFFER_SIZE) void flushLogs()
        }
      } catch (err) {
        const errorMessage = err instanceof Error ? err.message : 'Unknown error'
        process.stderr.write(`Failed to parse log entry: ${errorMessage}\n`)
      }
      callback()
    },
  })

  return {
    stream,
    async stop() {
      if (flushTimer) {
        clearInterval(flushTimer)
        flushTimer = null
      }
      await flushLogs()
    },
  }
}

// ============================================================================
// Fastify logger options
// ============================================================================

export interface LoggerOptions {
  level: string
  stream?: pino.DestinationStream
}

/**
 * Stdout logging, mirrored into the database when a sink is given
 */
export function buildLoggerOptions(level: string, sink?: DbLogSink): LoggerOptions {
  if (!sink) return { level }
  return {
    level,
    stream: pino.multistream([
      { level: 'trace', stream: process.stdout },
      { level: 'trace', stream: sink.stream },
    ]),
  }
}
