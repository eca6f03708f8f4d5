// Input checks for file paths handed to the loaders

import path from 'node:path'
import log from '../logger'

/**
 * Validates that a file path is safe to open
 */
export function isValidFilePath(filePath: string): boolean {
  if (!filePath || typeof filePath !== 'string') {
    return false
  }

  const normalized = path.normalize(filePath)

  // Reject paths with null bytes
  if (normalized.includes('\0')) {
    return false
  }

  const absolutePath = path.resolve(normalized)

  // UNC paths may reach network shares; allowed, but logged
  if (process.platform === 'win32' && absolutePath.startsWith('\\\\')) {
    log.warn('[SECURITY] UNC path access attempted:', absolutePath)
  }

  return true
}

/**
 * Lower-cased extension without the dot, or an empty string
 */
export function fileExtension(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase()
}
