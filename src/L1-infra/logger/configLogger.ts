import winston from 'winston'
import { join } from '../paths/paths.js'

/**
 * Escape newlines, carriage returns and tabs in user-supplied values
 * so one call is one log line.
 */
export function sanitizeForLog(value: unknown): string {
  if (value === null || value === undefined) return String(value)
  return String(value).replace(/[\r\n\t]/g, (c) => {
    switch (c) {
      case '\r': return '\\r'
      case '\n': return '\\n'
      default: return '\\t'
    }
  })
}

const LOG_FORMAT = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf(({ timestamp, level, message }) => {
    return `${timestamp} [${level.toUpperCase()}]: ${message}`
  }),
)

// Warnings and errors go to stderr.
const logger = winston.createLogger({
  level: 'info',
  format: LOG_FORMAT,
  transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn'] })],
})

export function setVerbose(): void {
  logger.level = 'debug'
}

// ── Run log pipes ────────────────────────────────────────────────────────────

const pipeStack: winston.transports.FileTransportInstance[] = []

/**
 * Tee all log output into `{folder}/framecast.log` until the matching popPipe().
 * Pipes nest; popPipe() removes the most recent one.
 */
export function pushPipe(folder: string): void {
  const transport = new winston.transports.File({
    filename: join(folder, 'framecast.log'),
    format: LOG_FORMAT,
  })
  pipeStack.push(transport)
  logger.add(transport)
}

export function popPipe(): void {
  const transport = pipeStack.pop()
  if (transport) {
    logger.remove(transport)
  }
}

export default logger
