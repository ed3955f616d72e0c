import { z } from 'zod'
import { readTextFile } from '../../L1-infra/fileSystem/fileSystem.js'
import { dirname, resolve } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { AssetReference, ContentUnit } from '../../L0-pure/types/index.js'
import { isRemote } from '../../L0-pure/assets/references.js'
import { ConfigError, errorMessage } from '../../L0-pure/errors/pipelineErrors.js'

// ── Types ────────────────────────────────────────────────────────────────────

/** Delivers the ordered content units of one run. */
export interface ContentSource {
  fetchUnits(): Promise<ContentUnit[]>
}

export interface ManifestOptions {
  /** Seconds per unit when neither the unit nor the manifest sets a duration */
  defaultDuration: number
}

// ── Schema ───────────────────────────────────────────────────────────────────

const durationSchema = z.number().positive().finite()

const unitSchema = z.object({
  kind: z.enum(['text', 'image', 'text+image']).optional(),
  text: z.string().optional(),
  /** Separate text blocks for layouts with text slots */
  fields: z.array(z.string()).optional(),
  image: z.string().min(1).optional(),
  duration: durationSchema.optional(),
})

const unitListSchema = z.object({
  title: z.string().optional(),
  defaultDuration: durationSchema.optional(),
  units: z.array(unitSchema),
})

const tableSchema = z.object({
  title: z.string().optional(),
  defaultDuration: durationSchema.optional(),
  columns: z.object({
    image: z.number().int().min(0).optional(),
    text: z.array(z.number().int().min(0)).optional(),
  }),
  rows: z.array(z.array(z.string())),
})

export type Manifest = z.infer<typeof unitListSchema> | z.infer<typeof tableSchema>
type UnitRecord = z.infer<typeof unitSchema>

// ── Conversion ───────────────────────────────────────────────────────────────

function joinFields(fields: string[]): string {
  return fields.filter((value) => value.trim() !== '').join('\n')
}

/**
 * Flatten the table form into unit records: one per row, text columns joined
 * by newlines. The columns are also kept apart, blanks included, so they stay
 * aligned with the layout's text slots.
 */
function tableToRecords(table: z.infer<typeof tableSchema>): UnitRecord[] {
  const { image: imageColumn, text: textColumns } = table.columns
  if (imageColumn === undefined && (!textColumns || textColumns.length === 0)) {
    throw new ConfigError('Manifest columns must name an image column, text columns, or both')
  }

  return table.rows.map((row, r) => {
    const cell = (c: number): string => {
      if (c >= row.length) {
        throw new ConfigError(`Manifest row ${r} has no column ${c} (it has ${row.length})`)
      }
      return row[c]
    }
    const image = imageColumn === undefined ? undefined : cell(imageColumn).trim() || undefined
    const fields = textColumns?.map(cell) ?? []
    const text = joinFields(fields)
    return text ? { image, text, fields } : { image }
  })
}

function toReference(location: string, baseDir: string): AssetReference {
  return isRemote(location) ? { type: 'url', url: location } : { type: 'file', path: resolve(baseDir, location) }
}

/**
 * Turn one record into a content unit. The kind is inferred from the populated
 * fields, and an explicit kind must agree with them.
 */
export function toContentUnit(record: UnitRecord, index: number, baseDir: string, defaultDuration: number): ContentUnit {
  const fieldText = record.fields ? joinFields(record.fields) : ''
  const text = record.text ?? (fieldText || undefined)
  const hasText = text !== undefined
  const inferred = hasText && record.image ? 'text+image' : record.image ? 'image' : hasText ? 'text' : undefined
  if (!inferred) {
    throw new ConfigError(`Manifest unit ${index} has neither text nor image`)
  }
  if (record.kind && record.kind !== inferred) {
    throw new ConfigError(`Manifest unit ${index} is declared '${record.kind}' but its fields make it '${inferred}'`)
  }

  const duration = record.duration ?? defaultDuration
  const fields = record.fields ? { fields: record.fields } : {}
  switch (inferred) {
    case 'text':
      return { kind: 'text', text: text ?? '', ...fields, duration }
    case 'image':
      return { kind: 'image', image: toReference(record.image ?? '', baseDir), duration }
    case 'text+image':
      return { kind: 'text+image', text: text ?? '', ...fields, image: toReference(record.image ?? '', baseDir), duration }
  }
}

/** Validate a parsed manifest document and convert it to content units. */
export function parseManifest(raw: unknown, baseDir: string, options: ManifestOptions): ContentUnit[] {
  // The table form is recognized by its `rows`, so schema errors point at the right fields.
  const isTable = typeof raw === 'object' && raw !== null && 'rows' in raw
  const parsed = isTable ? tableSchema.safeParse(raw) : unitListSchema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
    throw new ConfigError(`Invalid manifest: ${issues.join('; ')}`)
  }
  const manifest: Manifest = parsed.data
  const records = 'units' in manifest ? manifest.units : tableToRecords(manifest)
  const defaultDuration = manifest.defaultDuration ?? options.defaultDuration
  return records.map((record, index) => toContentUnit(record, index, baseDir, defaultDuration))
}

// ── Sources ──────────────────────────────────────────────────────────────────

/** Reads units from a JSON manifest. Relative image paths resolve against its folder. */
export class ManifestContentSource implements ContentSource {
  constructor(
    readonly manifestPath: string,
    private readonly options: ManifestOptions,
  ) {}

  async fetchUnits(): Promise<ContentUnit[]> {
    const fullPath = resolve(this.manifestPath)
    let raw: unknown
    try {
      raw = JSON.parse(await readTextFile(fullPath))
    } catch (err: unknown) {
      throw new ConfigError(`Cannot read manifest ${fullPath}: ${errorMessage(err)}`)
    }
    const units = parseManifest(raw, dirname(fullPath), this.options)
    logger.info(`Loaded ${units.length} content units from ${fullPath}`)
    return units
  }
}

/** A fixed, in-memory list of units. */
export class StaticContentSource implements ContentSource {
  constructor(private readonly units: readonly ContentUnit[]) {}

  async fetchUnits(): Promise<ContentUnit[]> {
    return [...this.units]
  }
}
