// Read-only view over a parsed OCA bundle: capture base plus overlays keyed by attribute

import { z } from 'zod'
import log from '../logger'
import type { AttributeType, RawBundle, RawSection } from '../types'
import { BundleKey, MANDATORY } from '../constants'
import { parseAttributeType } from '../matchers'

// =============================================================================
// RAW TREE SCHEMAS
// =============================================================================

const sectionSchema = z.object({ type: z.string().optional() }).passthrough()

const captureBaseSchema = sectionSchema.extend({
  attributes: z.record(z.string()),
  flagged_attributes: z.array(z.string()).optional()
})

export const rawBundleSchema = z.object({
  capture_base: captureBaseSchema,
  overlays: z.record(sectionSchema)
})

const formatOverlaySchema = z.object({
  attribute_formats: z.record(z.string().nullable()).default({})
})

const conformanceOverlaySchema = z.object({
  attribute_conformance: z.record(z.string()).default({})
})

const entryCodeOverlaySchema = z.object({
  // A string value is a reference to an entry code mapping, which is not supported
  attribute_entry_codes: z.record(z.union([z.array(z.coerce.string()), z.string()])).default({})
})

const encodingOverlaySchema = z.object({
  attribute_character_encoding: z.record(z.string().nullable()).default({}),
  default_character_encoding: z.string().optional()
})

/**
 * Validate an untyped tree (e.g. JSON.parse output) as a bundle
 */
export function parseRawBundle(input: unknown): RawBundle {
  const result = rawBundleSchema.safeParse(input)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue ? issue.path.join('.') || '(root)' : '(root)'
    throw new Error(`Invalid OCA bundle at ${where}: ${issue?.message ?? 'unknown error'}`)
  }
  return result.data
}

function readOverlay<T extends z.ZodTypeAny>(
  overlays: Record<string, RawSection>,
  name: string,
  schema: T
): z.output<T> | undefined {
  const overlay = overlays[name]
  if (!overlay) return undefined

  const result = schema.safeParse(overlay)
  if (!result.success) {
    throw new Error(`Invalid ${name} overlay: ${result.error.issues[0]?.message ?? 'unknown error'}`)
  }
  return result.data
}

// =============================================================================
// BUNDLE
// =============================================================================

export class OcaBundle {
  private readonly sections: ReadonlyMap<string, RawSection>
  private readonly attributes: ReadonlyMap<string, AttributeType>
  private readonly formats: ReadonlyMap<string, string>
  private readonly conformance: ReadonlyMap<string, boolean>
  private readonly entryCodeSets: ReadonlyMap<string, readonly string[]>
  private readonly characterEncodings: ReadonlyMap<string, string>
  private readonly defaultEncoding: string | undefined
  private readonly flagged: readonly string[]
  private readonly versions: ReadonlyMap<string, string>

  constructor(raw: RawBundle) {
    const { capture_base: captureBase, overlays } = raw

    const sections = new Map<string, RawSection>([[BundleKey.captureBase, captureBase]])
    for (const [name, overlay] of Object.entries(overlays)) {
      sections.set(name, overlay)
    }
    this.sections = sections

    this.attributes = new Map(
      Object.entries(captureBase.attributes).map(([name, tag]): [string, AttributeType] => [name, parseAttributeType(tag)])
    )
    this.flagged = [...(captureBase.flagged_attributes ?? [])]

    const format = readOverlay(overlays, BundleKey.format, formatOverlaySchema)
    const formats = new Map<string, string>()
    for (const [name, pattern] of Object.entries(format?.attribute_formats ?? {})) {
      if (pattern) formats.set(name, pattern)
    }
    this.formats = formats

    const conformance = readOverlay(overlays, BundleKey.conformance, conformanceOverlaySchema)
    this.conformance = new Map(
      Object.entries(conformance?.attribute_conformance ?? {}).map(([name, value]): [string, boolean] => [name, value === MANDATORY])
    )

    const entryCode = readOverlay(overlays, BundleKey.entryCode, entryCodeOverlaySchema)
    const entryCodeSets = new Map<string, readonly string[]>()
    for (const [name, codes] of Object.entries(entryCode?.attribute_entry_codes ?? {})) {
      if (typeof codes === 'string') {
        log.warn(`[BUNDLE] Entry code reference for "${name}" is not supported and was ignored`)
        continue
      }
      entryCodeSets.set(name, codes)
    }
    this.entryCodeSets = entryCodeSets

    const encoding = readOverlay(overlays, BundleKey.characterEncoding, encodingOverlaySchema)
    const characterEncodings = new Map<string, string>()
    for (const [name, value] of Object.entries(encoding?.attribute_character_encoding ?? {})) {
      if (value) characterEncodings.set(name, value)
    }
    this.characterEncodings = characterEncodings
    this.defaultEncoding = encoding?.default_character_encoding || undefined

    const versions = new Map<string, string>()
    for (const [name, section] of sections) {
      const version = section.type?.split('/').pop()
      if (version) versions.set(name, version)
    }
    this.versions = versions
  }

  static fromJson(input: unknown): OcaBundle {
    return new OcaBundle(parseRawBundle(input))
  }

  /**
   * Capture base or overlay section by name
   */
  overlay(name: string): RawSection {
    const section = this.sections.get(name)
    if (!section) {
      throw new Error(`Wrong overlay name: ${name}`)
    }
    return section
  }

  sectionNames(): string[] {
    return Array.from(this.sections.keys())
  }

  attributeNames(): string[] {
    return Array.from(this.attributes.keys())
  }

  hasAttribute(name: string): boolean {
    return this.attributes.has(name)
  }

  attributeType(name: string): AttributeType | undefined {
    return this.attributes.get(name)
  }

  format(name: string): string | undefined {
    return this.formats.get(name)
  }

  isMandatory(name: string): boolean {
    return this.conformance.get(name) ?? false
  }

  hasEntryCodes(name: string): boolean {
    return this.entryCodeSets.has(name)
  }

  entryCodes(name: string): readonly string[] | undefined {
    return this.entryCodeSets.get(name)
  }

  /**
   * Declared encoding of an attribute, else the overlay's default; undefined when neither is set
   */
  characterEncoding(name: string): string | undefined {
    return this.characterEncodings.get(name) ?? this.defaultEncoding
  }

  flaggedAttributes(): readonly string[] {
    return this.flagged
  }

  sectionVersions(): ReadonlyMap<string, string> {
    return this.versions
  }
}
