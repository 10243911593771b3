import { existsSync, readFileSync } from 'node:fs'
import { isAbsolute, join } from 'node:path'
import type { EntityResolutionConfig } from '@oral-history/config'
import { z } from 'zod'
import statesJson from '../data/us-states.json'
import { logger } from '../lib/lambda-common'

/**
 * Thrown when a required reference table is missing or has no header line.
 * Nothing can be resolved without it, so this is not recovered from.
 */
export class ReferenceDataError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message)
    this.name = 'ReferenceDataError'
  }
}

const StateInfoSchema = z.object({
  /** USGS numeric state code */
  stateId: z.number().int().positive(),
  /** USGS feature ID of the state itself */
  usgsId: z.number().int().positive(),
  /** Two-letter postal code */
  alpha: z.string().length(2),
  /** Full name first, then abbreviations and variants */
  names: z.array(z.string().min(1)).min(1),
})

export type StateInfo = z.infer<typeof StateInfoSchema>

/** Default state and place for a bare city name */
export interface CityHint {
  stateCode: number
  placeId: number
}

/** Place name to USGS place ID, per state code */
export type PlacesInStates = Map<number, Map<string, number>>

export interface LocationReferenceData {
  states: StateInfo[]
  places: PlacesInStates
  cityHints: Map<string, CityHint>
}

export interface OrganizationReferenceData {
  /** Authorized corporate name to name authority ID */
  corporateNames: Map<string, string>
  /** Alternate corporate name to name authority ID */
  corporateSynonyms: Map<string, string>
}

function parseInteger(value: string): number | undefined {
  return /^\s*[+-]?\d+\s*$/.test(value) ? Number.parseInt(value, 10) : undefined
}

/**
 * Read the data rows of a tab-separated table, skipping its header line.
 */
function readTable(path: string, table: string): string[][] {
  if (!existsSync(path)) {
    throw new ReferenceDataError(`Required ${table} file is missing: ${path}`, path)
  }

  const lines = readFileSync(path, 'utf-8').split(/\r?\n/)
  if (lines[lines.length - 1] === '') lines.pop()

  if (lines.length === 0) {
    throw new ReferenceDataError(`Required ${table} file is empty: ${path}`, path)
  }

  logger.debug('Loading reference table', { table, path })
  return lines.slice(1).map((line) => line.split('\t'))
}

/**
 * Load the bundled table of the 50 states and the District of Columbia,
 * ordered by state ID.
 */
export function loadStateTable(): StateInfo[] {
  return z
    .array(StateInfoSchema)
    .parse(statesJson)
    .sort((a, b) => a.stateId - b.stateId)
}

/**
 * Load USGS places as `placeId`, `name`, `stateId` rows. Every known state
 * gets an entry, even one without places.
 */
export function loadPlacesInStates(
  path: string,
  states: StateInfo[],
): PlacesInStates {
  const places: PlacesInStates = new Map(
    states.map((state) => [state.stateId, new Map<string, number>()]),
  )
  let count = 0

  for (const row of readTable(path, 'places')) {
    const placeId = row.length === 3 ? parseInteger(row[0]) : undefined
    const stateId = row.length === 3 ? parseInteger(row[2]) : undefined
    const inState = stateId === undefined ? undefined : places.get(stateId)

    if (placeId === undefined || inState === undefined) {
      logger.warn('Ignoring malformed place', { row: row.join('\t') })
    } else if (inState.has(row[1])) {
      logger.warn('Ignoring redundant place', { row: row.join('\t') })
    } else {
      inState.set(row[1], placeId)
      count++
    }
  }

  logger.info('Loaded places', { count })
  return places
}

/**
 * Load default states for well known city names as `name`, `alpha`,
 * `stateId`, `placeId` rows.
 */
export function loadCityHints(path: string): Map<string, CityHint> {
  const hints = new Map<string, CityHint>()

  for (const row of readTable(path, 'city hints')) {
    const stateCode = row.length === 4 ? parseInteger(row[2]) : undefined
    const placeId = row.length === 4 ? parseInteger(row[3]) : undefined

    if (stateCode === undefined || placeId === undefined) {
      logger.warn('Ignoring malformed city hint', { row: row.join('\t') })
    } else if (hints.has(row[0])) {
      logger.warn('Ignoring repeated city hint', { row: row.join('\t') })
    } else {
      hints.set(row[0], { stateCode, placeId })
    }
  }

  logger.info('Loaded city hints', { count: hints.size })
  return hints
}

/**
 * Load the corporate name authority as `name`, `authorityId` rows.
 */
export function loadCorporateNames(path: string): Map<string, string> {
  const names = new Map<string, string>()

  for (const row of readTable(path, 'corporate names')) {
    if (row.length !== 2) {
      logger.warn('Ignoring malformed corporate name', { row: row.join('\t') })
      continue
    }

    const name = row[0].trim()
    const authorityId = row[1].trim()
    if (name.length === 0 || authorityId.length === 0) {
      logger.warn('Ignoring corporate name with empty data', {
        row: row.join('\t'),
      })
    } else if (names.has(name)) {
      logger.warn('Ignoring redundant corporate name', { row: row.join('\t') })
    } else {
      names.set(name, authorityId)
    }
  }

  logger.info('Loaded corporate names', { count: names.size })
  return names
}

/**
 * Load alternate corporate names as `synonym`, `canonical`, `authorityId`
 * rows. The canonical name is informational only.
 */
export function loadCorporateSynonyms(path: string): Map<string, string> {
  const synonyms = new Map<string, string>()

  for (const row of readTable(path, 'corporate synonyms')) {
    if (row.length !== 3 || row[0].length === 0 || row[2].length === 0) {
      logger.warn('Ignoring malformed corporate synonym', {
        row: row.join('\t'),
      })
    } else if (synonyms.has(row[0])) {
      logger.warn('Ignoring redundant corporate synonym', {
        row: row.join('\t'),
      })
    } else {
      synonyms.set(row[0], row[2])
    }
  }

  logger.info('Loaded corporate synonyms', { count: synonyms.size })
  return synonyms
}

function dataDirectory(config: EntityResolutionConfig, baseDir: string) {
  return isAbsolute(config.dataPath)
    ? config.dataPath
    : join(baseDir, config.dataPath)
}

export function loadLocationReferenceData(
  config: EntityResolutionConfig,
  baseDir: string,
): LocationReferenceData {
  const dir = dataDirectory(config, baseDir)
  const states = loadStateTable()

  return {
    states,
    places: loadPlacesInStates(join(dir, config.placesFile), states),
    cityHints: loadCityHints(join(dir, config.cityHintsFile)),
  }
}

export function loadOrganizationReferenceData(
  config: EntityResolutionConfig,
  baseDir: string,
): OrganizationReferenceData {
  const dir = dataDirectory(config, baseDir)

  return {
    corporateNames: loadCorporateNames(join(dir, config.corporateNamesFile)),
    corporateSynonyms: loadCorporateSynonyms(
      join(dir, config.corporateSynonymsFile),
    ),
  }
}
