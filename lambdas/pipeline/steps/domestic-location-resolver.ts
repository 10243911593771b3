import { logger } from '../lib/lambda-common'
import type { LocationEntity, NamedEntity, Resolution } from '../types'
import { US_COUNTRY_CODE } from '../types'
import type {
  LocationReferenceData,
  StateInfo,
} from '../utils/reference-data'

const DC_ID = 11
const WA_ID = 53

// Punctuation may separate a place from its state, e.g. "Buffalo -- NY"
const ADJACENCY_EPSILON = 4

// Too ambiguous to match by containment
const WASHINGTON = 'Washington'

const GENERAL_LOCATION_WORDS = new Set([
  'Avenue',
  'Ave',
  'Boulevard',
  'Blvd',
  'Street',
  'St',
  'Road',
  'Lane',
  'Lake',
  'River',
])

const DC_MARKERS = [
  'd.c.',
  'district of columbia',
  'metro washington',
  'metro [washington',
]

const WA_MARKERS = [
  'king county',
  'seattle',
  'spokane',
  'yakima',
  'tacoma',
  'pasco',
  'fort lewis',
  'mcchord',
  'fairchild air force base',
  'kitsap',
  'state of washington',
  'washington state',
]

const PLACE_ALIASES = new Map([
  ['Philly', 'Philadelphia'],
  ['Phila.', 'Philadelphia'],
  ['LA', 'Los Angeles'],
  ['L.A.', 'Los Angeles'],
  ['L.A. Los Angeles', 'Los Angeles'],
  ['N.Y. City', 'New York City'],
  ['NY City', 'New York City'],
  ['NYC', 'New York City'],
  ['Pearl Harbor', 'Naval Station Pearl Harbor'],
  ['Vegas', 'Las Vegas'],
])

interface PlaceMatch {
  stateCode: number
  placeId: number
  /** Confidence gained: 2 for a place within a state, 1 for a state alone */
  bump: number
}

// =============================================================================
// Name helpers
// =============================================================================

/**
 * Whether the mention is a street, lake or river that a state name happens to
 * qualify, e.g. "Wyoming [Avenue]" or a bare "Lake Michigan".
 */
export function isGeneralLocation(text: string, context: string): boolean {
  const workContext = context.trim().length === 0 ? text : context

  let work = workContext.replace(/\]/g, '').trimEnd()
  if (work.endsWith('.')) work = work.slice(0, -1)

  const lastWordStart = Math.max(work.lastIndexOf('['), work.lastIndexOf(' ')) + 1
  if (GENERAL_LOCATION_WORDS.has(work.substring(lastWordStart))) return true

  if (text.startsWith('Lake ')) {
    const bare = workContext.replace(/[[\]]/g, '').trim()
    return bare.startsWith('Lake ') && bare.length <= text.length
  }

  return false
}

/**
 * Decide whether "Washington" means the District or the state from clues in
 * the given text. State clues win over District clues; no clue gives 0.
 */
export function considerWashington(text: string): number {
  const lower = text.toLowerCase()

  if (WA_MARKERS.some((marker) => lower.includes(marker))) return WA_ID
  if (DC_MARKERS.some((marker) => lower.includes(marker))) return DC_ID
  return 0
}

/**
 * Find a state ID for the given name.
 *
 * A two-letter code only ever matches exactly and wins at once, followed by
 * an exact match on any name variant. When `exact` is false, the longest
 * variant contained in the name wins, lowest state ID first on a tie.
 *
 * @returns The state ID, or 0 when nothing matches
 */
export function lookUpState(
  name: string,
  states: StateInfo[],
  exact = true,
): number {
  if (name.length <= 1) return 0

  const byAlpha = states.find((state) => state.alpha === name)
  if (byAlpha) return byAlpha.stateId

  const byName = states.find((state) => state.names.includes(name))
  if (byName) return byName.stateId
  if (exact) return 0

  let found = 0
  let longest = 0
  for (const state of states) {
    for (const variant of state.names) {
      if (
        variant !== WASHINGTON &&
        variant.length > longest &&
        name.includes(variant)
      ) {
        found = state.stateId
        longest = variant.length
      }
    }
  }

  return found
}

/**
 * Normalize a place mention to the form used by the USGS places table.
 */
export function properName(candidate: string): string {
  let name = candidate
    .replace(/[[\]]/g, ' ')
    .replace(/ AFB/g, ' Air Force Base')
    .trim()

  const lower = name.toLowerCase()
  if (lower.startsWith('the city of ')) {
    name = name.substring(12)
  } else if (lower.startsWith('city of ')) {
    name = name.substring(8)
  }

  if (name.includes('Ft.') && name.length > 4) {
    name = name.replace(/Ft\./g, 'Fort')
  }

  if (name.endsWith(' St.') && name.length > 4) {
    return `${name.slice(0, -4)} Street`
  }
  if (name.includes('St.')) {
    return name.replace(/St\./g, 'Saint')
  }
  return PLACE_ALIASES.get(name) ?? name
}

/**
 * Strip "sic" annotations and anything before the last bracket or separator
 * from a place candidate.
 */
export function trimPlaceName(candidate: string): string {
  let name = candidate.trim()

  const sicMarkers: [string, number][] = [
    ['[sic. ', 6],
    ['[sic ', 5],
    [' sic ', 5],
  ]
  for (const [marker, skip] of sicMarkers) {
    const at = name.lastIndexOf(marker)
    if (at >= 0) {
      name = name.substring(at + skip)
      break
    }
  }

  for (const separator of ['[', ':', ';', ',']) {
    name = name.substring(name.lastIndexOf(separator) + 1)
  }

  return name.trim()
}

/**
 * Split "place, state" or "place [state]" and look the state up inexactly.
 */
export function parsePlaceNameAndState(
  text: string,
  states: StateInfo[],
): { placeName: string; stateCode: number } {
  const usable = (at: number) => at >= 2 && at < text.length - 2

  let split = text.lastIndexOf(',')
  if (!usable(split)) split = text.lastIndexOf('[')
  if (!usable(split)) return { placeName: '', stateCode: 0 }

  let stateName = text.substring(split + 1).trim()
  if (stateName.endsWith(']')) stateName = stateName.slice(0, -1).trim()

  return {
    placeName: properName(trimPlaceName(text.substring(0, split))),
    stateCode: lookUpState(stateName, states, false),
  }
}

/**
 * The content of the last bracketed passage, or the whole text without one.
 */
function lastBracketContent(text: string): string {
  let content = text
  const open = content.lastIndexOf('[')
  if (open >= 0) content = content.substring(open + 1)
  const close = content.lastIndexOf(']')
  if (close >= 0) content = content.substring(0, close)
  return content
}

/**
 * Two-letter code for a state ID, or "unknown".
 */
export function codeToAlpha(stateCode: number, states: StateInfo[]): string {
  return states.find((state) => state.stateId === stateCode)?.alpha ?? 'unknown'
}

// =============================================================================
// Resolution passes
// =============================================================================

function placeIn(
  tables: LocationReferenceData,
  stateCode: number,
  placeName: string,
): PlaceMatch | undefined {
  const placeId = tables.places.get(stateCode)?.get(placeName)
  return placeId === undefined ? undefined : { stateCode, placeId, bump: 2 }
}

/**
 * Settle for the state itself, its own USGS ID standing in for the place.
 */
function stateOnly(
  tables: LocationReferenceData,
  stateCode: number,
  context: string,
): PlaceMatch | undefined {
  const resolved = stateCode === WA_ID ? considerWashington(context) : stateCode
  const state = tables.states.find((s) => s.stateId === resolved)
  return state && { stateCode: resolved, placeId: state.usgsId, bump: 1 }
}

/**
 * A comma in the mention itself, e.g. "Springfield, Illinois".
 */
function resolveFromText(
  location: LocationEntity,
  tables: LocationReferenceData,
): PlaceMatch | undefined {
  const { text } = location
  if (text.indexOf(',') <= 0) return undefined

  const { placeName, stateCode } = parsePlaceNameAndState(text, tables.states)
  if (stateCode === 0) return undefined

  const bracket = text.indexOf('[')
  return (
    placeIn(tables, stateCode, placeName) ??
    (bracket > 0
      ? placeIn(tables, stateCode, properName(text.substring(0, bracket).trim()))
      : undefined) ??
    stateOnly(tables, stateCode, location.contextualizedText)
  )
}

/**
 * Annotation around the mention, e.g. "Wrigley Field [Chicago, Illinois]".
 */
function resolveFromContext(
  location: LocationEntity,
  tables: LocationReferenceData,
): PlaceMatch | undefined {
  const { text, contextualizedText: context } = location
  if (text === context) return undefined

  const at = context.indexOf(text)
  const presumedState =
    at >= 0 && at + text.length < context.length - 1
      ? context.substring(at + text.length).trim()
      : lastBracketContent(context)

  const stateCode = lookUpState(presumedState, tables.states, false)
  const direct =
    stateCode === 0
      ? undefined
      : placeIn(tables, stateCode, properName(text.trim()))
  if (direct) return direct

  const parsed = parsePlaceNameAndState(context, tables.states)
  if (parsed.stateCode === 0) return undefined

  return (
    placeIn(tables, parsed.stateCode, parsed.placeName) ??
    placeIn(tables, parsed.stateCode, properName(text.trim())) ??
    stateOnly(tables, parsed.stateCode, context)
  )
}

/**
 * A state mentioned right after the place, e.g. "Cairo" then "Illinois".
 * On success the neighbour is resolved to the same place.
 */
function resolveFromNeighbour(
  location: LocationEntity,
  next: LocationEntity | undefined,
  tables: LocationReferenceData,
): PlaceMatch | undefined {
  if (
    !next ||
    next.startOffset > ADJACENCY_EPSILON + location.startOffset + location.length
  ) {
    return undefined
  }

  const stateCode = lookUpState(next.text, tables.states)
  const match =
    stateCode === 0
      ? undefined
      : placeIn(tables, stateCode, properName(location.text.trim()))

  if (match) {
    next.stateCode = match.stateCode
    next.placeId = match.placeId
    next.confidence += match.bump
  }

  return match
}

/**
 * Well known cities, then the mention as a state name.
 */
function resolveByName(
  location: LocationEntity,
  tables: LocationReferenceData,
): PlaceMatch | undefined {
  const name = properName(location.text.trim())

  const hint = tables.cityHints.get(name)
  if (hint) return { ...hint, bump: 2 }

  const stateCode = lookUpState(name, tables.states)
  return stateCode === 0
    ? undefined
    : stateOnly(tables, stateCode, location.contextualizedText)
}

/**
 * Resolve location mentions of one story to U.S. places.
 *
 * Each mention is tried against its own text, its transcriber annotation, an
 * adjacent state mention, the city hint table and finally the state names.
 * Mentions left unresolved then borrow the resolution of an identical mention.
 * Resolved places are reduced to one entity per place with occurrence counts.
 *
 * @param candidates - Named entities of the story in offset order; only `Loc`
 * entities are considered and none are modified
 * @param tables - State, place and city hint tables
 */
export function resolveLocations(
  candidates: NamedEntity[],
  tables: LocationReferenceData,
): Resolution<LocationEntity> {
  const locations: LocationEntity[] = candidates
    .filter((candidate) => candidate.type === 'Loc')
    .map((candidate) => ({
      ...candidate,
      countryCode: US_COUNTRY_CODE,
      stateCode: 0,
      placeId: 0,
      count: 1,
    }))

  locations.forEach((location, i) => {
    // Already settled as the state of an adjacent place
    if (location.stateCode !== 0) return

    if (isGeneralLocation(location.text, location.contextualizedText)) {
      logger.debug('Skipping general location', { text: location.text })
      return
    }

    const match =
      resolveFromText(location, tables) ??
      resolveFromContext(location, tables) ??
      resolveFromNeighbour(location, locations[i + 1], tables) ??
      resolveByName(location, tables)

    if (match) {
      location.stateCode = match.stateCode
      location.placeId = match.placeId
      location.confidence += match.bump
    }
  })

  for (const location of locations) {
    if (location.stateCode !== 0) continue

    const same = locations.find(
      (other) =>
        other !== location &&
        other.text === location.text &&
        other.stateCode !== 0,
    )
    if (same) {
      location.placeId = same.placeId
      location.stateCode = same.stateCode
      location.confidence = same.confidence
    }
  }

  const resolved = new Map<number, LocationEntity>()
  const unresolved: LocationEntity[] = []

  for (const location of locations) {
    if (location.stateCode === 0) {
      location.placeId = 0
      location.countryCode = 0
      unresolved.push(location)
      continue
    }

    const existing = resolved.get(location.placeId)
    if (existing) {
      existing.count++
      existing.confidence = Math.max(existing.confidence, location.confidence)
    } else {
      resolved.set(location.placeId, location)
    }
  }

  for (const location of resolved.values()) {
    if (location.count > 3) location.confidence += 1
  }

  logger.info('Resolved locations', {
    resolved: resolved.size,
    unresolved: unresolved.length,
  })

  return { resolved: [...resolved.values()], unresolved }
}
