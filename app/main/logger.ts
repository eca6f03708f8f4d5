// Shared electron-log instance for plain Node.js

import log from 'electron-log/node'
import type { LogLevel } from './types'

// Console only; the validator writes no log files of its own
log.transports.file.level = false
log.transports.console.level = 'warn'

export function setLogLevel(level: LogLevel): void {
  log.transports.console.level = level
}

export default log
