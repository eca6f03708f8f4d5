import path from 'node:path'
import * as fs from 'fs'
import { z } from 'zod'
import log from './logger'
import type { ValidatorSettings } from './types'
import { DEFAULT_SETTINGS } from './constants'

export const SETTINGS_ENV_VAR = 'OCA_VALIDATOR_SETTINGS'

const settingsSchema = z
  .object({
    supportedVersion: z.string().min(1),
    errorThreshold: z.number().int().nonnegative(),
    defaultEncoding: z.string().min(1),
    dataEntrySheet: z.string().min(1),
    previewRows: z.number().int().positive(),
    logLevel: z.enum(['error', 'warn', 'info', 'verbose', 'debug', 'silly'])
  })
  .partial()

export class SettingsManager {
  private readonly settingsPath: string | undefined
  private readonly settings: ValidatorSettings

  constructor(settingsPath: string | undefined = process.env[SETTINGS_ENV_VAR]) {
    this.settingsPath = settingsPath ? path.resolve(settingsPath) : undefined
    this.settings = this.loadSettings()
  }

  private loadSettings(): ValidatorSettings {
    if (!this.settingsPath) {
      return { ...DEFAULT_SETTINGS }
    }

    if (!fs.existsSync(this.settingsPath)) {
      throw new Error(`Settings file does not exist: ${this.settingsPath}`)
    }

    let loaded: unknown
    try {
      loaded = JSON.parse(fs.readFileSync(this.settingsPath, 'utf-8'))
    } catch (error) {
      log.error('[SETTINGS] Failed to load settings:', error)
      throw error
    }

    const result = settingsSchema.safeParse(loaded)
    if (!result.success) {
      const issue = result.error.issues[0]
      throw new Error(`Invalid settings in ${this.settingsPath}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown error'}`)
    }

    // Merge with defaults to ensure all fields exist
    return {
      ...DEFAULT_SETTINGS,
      ...result.data
    }
  }

  getSettingsPath(): string | undefined {
    return this.settingsPath
  }

  getSettings(): ValidatorSettings {
    return { ...this.settings }
  }
}
