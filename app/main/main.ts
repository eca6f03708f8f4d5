#!/usr/bin/env node
import * as fs from 'fs'
import { Command } from 'commander'
import log, { setLogLevel } from './logger'
import { SettingsManager } from './SettingsManager'
import { loadBundle } from './bundle/loader'
import { loadDataSet } from './parsers'
import { validate } from './validation'
import { reportToTable, writeCsv, writeXlsx } from './writers'
import { fileExtension } from './utils/security'

// =============================================================================
// EXIT CODES
// =============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  FINDINGS: 1,
  FAILURE: 2
} as const

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES]

export interface CliOptions {
  settings?: string
  preview?: boolean
  flaggedAlarm?: boolean
  versionAlarm?: boolean
  column?: string
  first?: boolean
  export?: string
  json?: string
}

// =============================================================================
// VALIDATE COMMAND
// =============================================================================

/**
 * Load the bundle and data set, validate, print the summary and write any requested exports
 */
export function runValidation(
  bundlePath: string,
  dataSetPath: string,
  options: CliOptions,
  print: (line: string) => void = line => console.log(line)
): ExitCode {
  try {
    const settingsManager = new SettingsManager(options.settings)
    const settings = settingsManager.getSettings()
    setLogLevel(options.preview ? 'info' : settings.logLevel)

    const bundle = loadBundle(bundlePath)
    const dataSet = loadDataSet(dataSetPath, settings.dataEntrySheet)
    log.info(`[CLI] Loaded ${dataSet.rowCount} rows from ${dataSetPath}`)

    const report = validate(bundle, dataSet, {
      showDataPreview: options.preview ?? false,
      enableFlaggedAlarm: options.flaggedAlarm ?? true,
      enableVersionAlarm: options.versionAlarm ?? true,
      supportedVersion: settings.supportedVersion,
      defaultEncoding: settings.defaultEncoding,
      errorThreshold: settings.errorThreshold,
      previewRows: settings.previewRows
    })

    for (const warning of report.warnings) {
      print(`Warning: ${warning.message}`)
    }
    report.overview().lines.forEach(print)

    if (options.first) {
      report.firstErrorColumn().lines.forEach(print)
    }
    if (options.column) {
      report.getColumnDetail(options.column).lines.forEach(print)
    }

    if (options.export) {
      const table = reportToTable(report)
      if (table.length === 0) {
        log.warn('[CLI] Nothing to export: no findings')
      } else if (fileExtension(options.export) === 'xlsx') {
        writeXlsx(table, options.export)
      } else {
        writeCsv(table, options.export)
      }
    }

    if (options.json) {
      fs.writeFileSync(options.json, JSON.stringify(report, null, 2), 'utf-8')
    }

    return report.hasErrors() ? EXIT_CODES.FINDINGS : EXIT_CODES.SUCCESS
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error)
    log.error('[CLI] Validation failed:', errorMessage)
    return EXIT_CODES.FAILURE
  }
}

export function buildProgram(): Command {
  const program = new Command()

  program
    .name('oca-validate')
    .description('Validate a CSV or Excel data set against an OCA bundle')
    .argument('<bundle>', 'OCA bundle (.json or .zip)')
    .argument('<dataset>', 'data set (.csv, .xls or .xlsx)')
    .option('-s, --settings <file>', 'settings JSON file')
    .option('-p, --preview', 'log a preview of the data set')
    .option('--no-flagged-alarm', 'do not warn about flagged attributes')
    .option('--no-version-alarm', 'do not warn about OCA version mismatches')
    .option('-c, --column <name>', 'print the findings of one column')
    .option('-f, --first', 'print the findings of the first problematic column')
    .option('-e, --export <file>', 'write findings to a .csv or .xlsx file')
    .option('-j, --json <file>', 'write the full report as JSON')
    .action((bundle: string, dataset: string, options: CliOptions) => {
      process.exitCode = runValidation(bundle, dataset, options)
    })

  return program
}

if (require.main === module) {
  buildProgram().parse(process.argv)
}
