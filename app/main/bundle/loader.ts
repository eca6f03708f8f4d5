// Bundle loading from .json files and .zip archives

import * as fs from 'fs'
import path from 'node:path'
import { unzipSync, strFromU8 } from 'fflate'
import { z } from 'zod'
import log from '../logger'
import type { RawBundle } from '../types'
import { BundleKey } from '../constants'
import { fileExtension, isValidFilePath } from '../utils/security'
import { OcaBundle, parseRawBundle } from './index'

const META_FILE = 'meta.json'

const metaSchema = z.object({
  root: z.string(),
  files: z.record(z.record(z.string()))
})

function parseJsonText(text: string, source: string): unknown {
  try {
    return JSON.parse(text)
  } catch (error) {
    log.error(`[BUNDLE] ${source} is not valid JSON`)
    throw new Error(`Could not parse ${source}: ${error instanceof Error ? error.message : String(error)}`)
  }
}

/**
 * Assemble a bundle tree from the entries of a bundle archive.
 * meta.json names the capture base file (root) and, under files[root], each overlay's file.
 */
export function readBundleArchive(bytes: Uint8Array): RawBundle {
  let entries: Record<string, Uint8Array>
  try {
    entries = unzipSync(bytes)
  } catch (error) {
    throw new Error(`Unreadable bundle archive: ${error instanceof Error ? error.message : String(error)}`)
  }

  const metaPath = Object.keys(entries)
    .filter(name => name === META_FILE || name.endsWith(`/${META_FILE}`))
    .sort((a, b) => a.length - b.length)[0]
  if (!metaPath) {
    throw new Error(`Bundle archive has no ${META_FILE}`)
  }
  const baseDir = metaPath.slice(0, metaPath.length - META_FILE.length)

  const readEntry = (name: string): unknown => {
    const entryPath = `${baseDir}${name}`
    const entry = entries[entryPath]
    if (!entry) {
      throw new Error(`Bundle archive is missing ${entryPath}`)
    }
    return parseJsonText(strFromU8(entry), entryPath)
  }

  const metaResult = metaSchema.safeParse(readEntry(META_FILE))
  if (!metaResult.success) {
    throw new Error(`Invalid ${META_FILE}: ${metaResult.error.issues[0]?.message ?? 'unknown error'}`)
  }
  const meta = metaResult.data

  const overlays: Record<string, unknown> = {}
  for (const [overlayName, fileName] of Object.entries(meta.files[meta.root] ?? {})) {
    if (overlayName === BundleKey.captureBase) continue
    overlays[overlayName] = readEntry(`${fileName}.json`)
  }

  return parseRawBundle({
    [BundleKey.captureBase]: readEntry(`${meta.root}.json`),
    [BundleKey.overlays]: overlays
  })
}

/**
 * Load an OCA bundle from a .json bundle file or a .zip bundle archive
 */
export function loadBundle(filePath: string): OcaBundle {
  if (!isValidFilePath(filePath)) {
    throw new Error('Invalid file path')
  }
  if (!fs.existsSync(filePath)) {
    throw new Error(`Bundle file does not exist: ${filePath}`)
  }

  const ext = fileExtension(filePath)
  if (ext === 'json') {
    const text = fs.readFileSync(filePath, 'utf-8')
    return OcaBundle.fromJson(parseJsonText(text, path.basename(filePath)))
  } else if (ext === 'zip') {
    const bytes = new Uint8Array(fs.readFileSync(filePath))
    return new OcaBundle(readBundleArchive(bytes))
  } else {
    throw new Error(`Unsupported bundle file type: ${ext || filePath}`)
  }
}
