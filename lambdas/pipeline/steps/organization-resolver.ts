import { logger } from '../lib/lambda-common'
import type {
  NamedEntity,
  OrganizationalEntity,
  Resolution,
} from '../types'
import type { OrganizationReferenceData } from '../utils/reference-data'

/** The same mention resolved to two different authority IDs within a story */
export interface OrganizationConflict {
  text: string
  ids: [string, string]
}

export interface OrganizationResolution
  extends Resolution<OrganizationalEntity> {
  conflict?: OrganizationConflict
}

type ContextMarker = '[' | '(' | ''

const SPORTS = ['basketball', 'hockey', 'football', 'baseball'] as const

type Sport = (typeof SPORTS)[number]

// Qualifiers dropped between the team name and the sport
const TEAM_QUALIFIERS: Record<Sport, string[]> = {
  basketball: ['('],
  hockey: ['('],
  football: ['American', 'professional', '('],
  baseball: [
    'American League',
    'National League',
    'Negro League',
    'professional',
    '(',
  ],
}

/**
 * Clean up a mention before lookup: brackets become spaces, a leading "sic"
 * annotation and trailing separators are dropped.
 */
export function trimOrgName(candidate: string): string {
  let name = candidate
    .replace(/[[\]]/g, ' ')
    .replace(/&/g, ' & ')
    .replace(/ {2}/g, ' ')
    .trim()

  if (name.startsWith('sic. ')) {
    name = name.substring(5)
  } else if (name.startsWith('sic ')) {
    name = name.substring(4)
  }

  while (/[:;,]$/.test(name)) {
    name = name.slice(0, -1).trim()
  }

  return name
}

/**
 * Rewrite "NAME (professional league sport team)" into the "NAME (Sport team)"
 * form used by the name authority. The parentheses are optional. Football
 * drops "American" and "professional", baseball drops "professional" and the
 * league name.
 */
export function recastSportsTeam(text: string): string | undefined {
  let end = -1
  if (text.endsWith(' team')) {
    end = text.length - 5
  } else if (text.endsWith(' team)')) {
    end = text.length - 6
  }
  if (end <= 0) return undefined

  const work = text.substring(0, end).trim()
  const sportAt = work.lastIndexOf(' ')
  if (sportAt <= 3 || sportAt > work.length - 6) return undefined

  const sport = SPORTS.find(
    (s) => work.substring(sportAt + 1).toLowerCase().replace(/^\(/, '') === s,
  )
  if (!sport) return undefined

  let name = work.substring(0, sportAt).trim()
  const qualifiers = TEAM_QUALIFIERS[sport]
  let qualifier = qualifiers.find((q) => name.endsWith(q))
  while (qualifier) {
    name = name.slice(0, -qualifier.length).trim()
    qualifier = qualifiers.find((q) => name.endsWith(q))
  }

  return `${name} (${sport.charAt(0).toUpperCase()}${sport.slice(1)} team)`
}

function withoutPrefix(key: string, prefixes: string[]): string | undefined {
  const prefix = prefixes.find((p) => key.startsWith(p))
  return prefix === undefined ? undefined : key.substring(prefix.length)
}

function lookUpSynonym(
  key: string,
  tables: OrganizationReferenceData,
): string | undefined {
  const { corporateSynonyms } = tables
  const exact = corporateSynonyms.get(key)
  if (exact !== undefined) return exact

  // Agencies are listed as "U.S." only
  let alternate: string | undefined
  if (key.includes('United States')) {
    alternate = key.replace(/United States/g, 'U.S.')
  } else {
    alternate = withoutPrefix(key, ['The ', 'the ', 'later '])
  }

  return alternate === undefined ? undefined : corporateSynonyms.get(alternate)
}

function lookUpAuthority(
  key: string,
  tables: OrganizationReferenceData,
): string | undefined {
  const { corporateNames } = tables
  const exact = corporateNames.get(key)
  if (exact !== undefined) return exact

  let alternate = withoutPrefix(key, ['The ', 'the ', 'later '])
  if (alternate === undefined && key.startsWith('UC ')) {
    alternate = `University of California, ${key.substring(3)}`
  }
  if (alternate === undefined) {
    alternate = recastSportsTeam(key)
  }

  return alternate === undefined ? undefined : corporateNames.get(alternate)
}

function lookUp(
  key: string,
  tables: OrganizationReferenceData,
): string | undefined {
  return lookUpSynonym(key, tables) ?? lookUpAuthority(key, tables)
}

/**
 * Text from `start` up to the first bracket, comma, semicolon or parenthesis.
 */
function nameAfter(text: string, start: number): string {
  const rest = text.substring(start)
  const cut = rest.search(/[[,;(]/)
  return (cut >= 0 ? rest.substring(0, cut) : rest).trim()
}

/**
 * Text before `end`, back to the last bracket, separator or "sic" annotation.
 */
function nameBefore(text: string, end: number): string {
  const head = text.substring(0, end)

  const sicDot = head.lastIndexOf('sic. ')
  const sic = head.lastIndexOf('sic ')
  const lastSic = sicDot >= 0 ? sicDot + 4 : sic >= 0 ? sic + 3 : -1

  const cut = Math.max(
    head.lastIndexOf('['),
    head.lastIndexOf(','),
    head.lastIndexOf(';'),
    head.lastIndexOf('('),
    lastSic,
  )

  return (cut >= 0 ? head.substring(cut + 1) : head).trim()
}

/**
 * Recover a college or university name from a mention such as
 * "Morehouse [College]" or "Georgia State College [Savannah State University]".
 */
function parseCollegeMention(
  given: string,
  marker: ContextMarker,
  tables: OrganizationReferenceData,
): string | undefined {
  let suffix = given
  const at = marker === '' ? -1 : given.indexOf(marker)

  if (at >= 2 && at < given.length - 1) {
    const prefix = given.substring(0, at).trim()
    suffix = given.substring(at + 1)

    if (!prefix.includes('College') && !prefix.includes('University')) {
      let candidate: string | undefined
      if (suffix.startsWith('University')) {
        candidate = `${trimOrgName(prefix)} University`
      } else if (suffix.startsWith('College')) {
        candidate = `${trimOrgName(prefix)} College`
      }
      const fromSuffixStart = candidate && lookUp(candidate, tables)
      if (fromSuffixStart) return fromSuffixStart

      candidate = [
        `${prefix} University`,
        `University of ${prefix}`,
        `${prefix} College`,
      ].find((name) => suffix.includes(name))
      const fromSuffix = candidate && lookUp(candidate, tables)
      if (fromSuffix) return fromSuffix
    }
  }

  let presumed = ''
  const universityOf = suffix.indexOf('University of')
  if (universityOf > 0 && universityOf + 13 < suffix.length) {
    presumed = `University of ${nameAfter(suffix, universityOf + 13)}`
  }

  const university = suffix.indexOf(' University')
  const college = suffix.indexOf(' College')
  if (university > 0) {
    presumed = `${nameBefore(suffix, university)} University`
  } else if (college > 0) {
    presumed = `${nameBefore(suffix, college)} College`
  }

  return presumed.length > 0 ? lookUp(presumed, tables) : undefined
}

/**
 * Find the authority ID for an organization mention, trying the whole
 * mention, then the parts around a bracket or parenthesis, then any college
 * or university it names.
 */
function parseOrganization(
  given: string,
  tables: OrganizationReferenceData,
): string | undefined {
  const whole = lookUp(trimOrgName(given), tables)
  if (whole) return whole

  const bracket = given.indexOf('[')
  const hasBracket = bracket >= 2 && bracket < given.length - 1
  if (hasBracket) {
    const found =
      lookUp(trimOrgName(given.substring(0, bracket)), tables) ??
      lookUp(trimOrgName(given.substring(bracket + 1)), tables)
    if (found) return found
  }

  const paren = given.indexOf('(')
  const hasParen = paren >= 2 && paren < given.length - 1
  if (hasParen) {
    const inner = trimOrgName(given.substring(paren + 1)).replace(/\)$/, '')
    const found =
      lookUp(trimOrgName(given.substring(0, paren)), tables) ??
      lookUp(inner, tables)
    if (found) return found
  }

  return (
    (hasBracket ? parseCollegeMention(given, '[', tables) : undefined) ??
    (hasParen ? parseCollegeMention(given, '(', tables) : undefined) ??
    parseCollegeMention(given, '', tables)
  )
}

function resolveMention(
  organization: OrganizationalEntity,
  tables: OrganizationReferenceData,
): string | undefined {
  const { text, contextualizedText: context } = organization

  const fromText = parseOrganization(text, tables)
  if (fromText || text === context) return fromText

  const fromContext = parseOrganization(context, tables)
  if (fromContext) return fromContext

  const at = context.indexOf(text)
  if (at >= 0 && at + text.length < context.length - 1) {
    return parseOrganization(context.substring(at + text.length).trim(), tables)
  }
  return undefined
}

/**
 * Resolve organization mentions of one story to name authority IDs.
 *
 * Mentions sharing a text share the ID any of them resolved to. When the same
 * text resolves to two different IDs the story is abandoned: nothing is
 * returned but the conflict.
 *
 * @param candidates - Named entities of the story; only `Org` entities are
 * considered and none are modified
 * @param tables - Corporate name authority and synonym tables
 */
export function resolveOrganizations(
  candidates: NamedEntity[],
  tables: OrganizationReferenceData,
): OrganizationResolution {
  const organizations: OrganizationalEntity[] = candidates
    .filter((candidate) => candidate.type === 'Org')
    .map((candidate) => ({ ...candidate, authorityId: '', count: 1 }))

  for (const organization of organizations) {
    const authorityId = resolveMention(organization, tables)
    if (authorityId) {
      organization.authorityId = authorityId
      organization.confidence++
    }
  }

  const idByText = new Map<string, string>()
  for (const { text, authorityId } of organizations) {
    const known = idByText.get(text)

    if (known === undefined || known === '') {
      idByText.set(text, authorityId)
    } else if (authorityId !== '' && authorityId !== known) {
      const conflict: OrganizationConflict = { text, ids: [known, authorityId] }
      logger.error('Same organization name resolved to different IDs', {
        ...conflict,
      })
      return { resolved: [], unresolved: [], conflict }
    }
  }

  const resolved = new Map<string, OrganizationalEntity>()
  const unresolved: OrganizationalEntity[] = []

  for (const organization of organizations) {
    organization.authorityId = idByText.get(organization.text) ?? ''

    if (organization.authorityId === '') {
      unresolved.push(organization)
      continue
    }

    const existing = resolved.get(organization.authorityId)
    if (existing) {
      existing.count++
      existing.confidence = Math.max(
        existing.confidence,
        organization.confidence,
      )
    } else {
      resolved.set(organization.authorityId, organization)
    }
  }

  for (const organization of resolved.values()) {
    if (organization.count >= 2) organization.confidence += 1
  }

  logger.info('Resolved organizations', {
    resolved: resolved.size,
    unresolved: unresolved.length,
  })

  return { resolved: [...resolved.values()], unresolved }
}
