import { describe, expect, it } from 'vitest'
import type { LocationEntity, NamedEntity } from '../types'
import {
  type LocationReferenceData,
  loadStateTable,
} from '../utils/reference-data'
import {
  codeToAlpha,
  considerWashington,
  isGeneralLocation,
  lookUpState,
  parsePlaceNameAndState,
  properName,
  resolveLocations,
  trimPlaceName,
} from './domestic-location-resolver'

const states = loadStateTable()

const CHICAGO = 423587
const SPRINGFIELD = 1000017
const CAIRO = 1000018
const ANNAPOLIS = 1000024
const WASHINGTON_DC = 531871
const NEW_ORLEANS = 1629985

const places = new Map(
  states.map((state): [number, Map<string, number>] => [
    state.stateId,
    new Map(),
  ]),
)
places.set(
  17,
  new Map([
    ['Chicago', CHICAGO],
    ['Springfield', SPRINGFIELD],
    ['Cairo', CAIRO],
  ]),
)
places.set(24, new Map([['Annapolis', ANNAPOLIS]]))
places.set(11, new Map([['Washington', WASHINGTON_DC]]))

const tables: LocationReferenceData = {
  states,
  places,
  cityHints: new Map([
    ['New Orleans', { stateCode: 22, placeId: NEW_ORLEANS }],
  ]),
}

function loc(
  text: string,
  contextualizedText = text,
  startOffset = 0,
): NamedEntity {
  return {
    text,
    contextualizedText,
    startOffset,
    length: text.length,
    type: 'Loc',
    confidence: 1,
  }
}

describe('resolveLocations', () => {
  it('resolves a well known city through the hint table', () => {
    const { resolved, unresolved } = resolveLocations(
      [loc('New Orleans')],
      tables,
    )

    expect(unresolved).toEqual([])
    expect(resolved).toHaveLength(1)
    expect(resolved[0]).toMatchObject({
      countryCode: 840,
      stateCode: 22,
      placeId: NEW_ORLEANS,
      confidence: 3,
      count: 1,
    })
  })

  it('reads Washington as the state when the context names Seattle', () => {
    const { resolved } = resolveLocations(
      [loc('Washington', 'Washington [Seattle]')],
      tables,
    )

    expect(resolved[0]).toMatchObject({
      stateCode: 53,
      placeId: 1779804,
      confidence: 2,
    })
  })

  it('reads Washington as the District when the context names D.C.', () => {
    const { resolved } = resolveLocations(
      [loc('Washington', 'Washington [D.C.]')],
      tables,
    )

    expect(resolved[0]).toMatchObject({
      stateCode: 11,
      placeId: WASHINGTON_DC,
      confidence: 3,
    })
  })

  it('leaves a bare Washington unresolved', () => {
    const { resolved, unresolved } = resolveLocations(
      [loc('Washington')],
      tables,
    )

    expect(resolved).toEqual([])
    expect(unresolved).toHaveLength(1)
    expect(unresolved[0]).toMatchObject({
      countryCode: 0,
      stateCode: 0,
      placeId: 0,
      confidence: 1,
    })
  })

  it('resolves a place and state separated by a comma', () => {
    const { resolved } = resolveLocations(
      [loc('Springfield, Illinois')],
      tables,
    )

    expect(resolved[0]).toMatchObject({
      stateCode: 17,
      placeId: SPRINGFIELD,
      confidence: 3,
    })
  })

  it('falls back to the text before a bracket for the place', () => {
    const { resolved } = resolveLocations(
      [loc('Annapolis [U.S. Naval Academy, Maryland]')],
      tables,
    )

    expect(resolved[0]).toMatchObject({
      stateCode: 24,
      placeId: ANNAPOLIS,
      confidence: 3,
    })
  })

  it('uses a city and state found in the bracketed context', () => {
    const { resolved } = resolveLocations(
      [loc('Wrigley Field', 'Wrigley Field [Chicago, Illinois]')],
      tables,
    )

    expect(resolved[0]).toMatchObject({
      text: 'Wrigley Field',
      stateCode: 17,
      placeId: CHICAGO,
      confidence: 3,
    })
  })

  it('settles for the state when the context place is unknown', () => {
    const { resolved } = resolveLocations(
      [loc('Hardeman County', 'Hardeman County [Tennessee]')],
      tables,
    )

    expect(resolved[0]).toMatchObject({
      stateCode: 47,
      placeId: 1325873,
      confidence: 2,
    })
  })

  it('pairs a place with an adjacent state mention', () => {
    const { resolved, unresolved } = resolveLocations(
      [loc('Cairo', 'Cairo', 10), loc('Illinois', 'Illinois', 17)],
      tables,
    )

    expect(unresolved).toEqual([])
    expect(resolved).toHaveLength(1)
    expect(resolved[0]).toMatchObject({
      text: 'Cairo',
      stateCode: 17,
      placeId: CAIRO,
      confidence: 3,
      count: 2,
    })
  })

  it('does not treat a street named after a state as the state', () => {
    const { resolved, unresolved } = resolveLocations(
      [loc('Wyoming', 'Wyoming [Avenue]'), loc('Lake Michigan', 'Lake Michigan', 40)],
      tables,
    )

    expect(resolved).toEqual([])
    expect(unresolved.map((l) => l.text)).toEqual(['Wyoming', 'Lake Michigan'])
  })

  it('copies a resolution to identical mentions left unresolved', () => {
    const { resolved, unresolved } = resolveLocations(
      [
        loc('Cairo', 'Cairo', 10),
        loc('Illinois', 'Illinois', 17),
        loc('Cairo', 'Cairo', 100),
      ],
      tables,
    )

    expect(unresolved).toEqual([])
    expect(resolved).toHaveLength(1)
    expect(resolved[0]).toMatchObject({ placeId: CAIRO, count: 3, confidence: 3 })
  })

  it('boosts a place mentioned more than three times', () => {
    const { resolved } = resolveLocations(
      [0, 20, 40, 60].map((offset) => loc('New Orleans', 'New Orleans', offset)),
      tables,
    )

    expect(resolved).toHaveLength(1)
    expect(resolved[0]).toMatchObject({ count: 4, confidence: 4 })
  })

  it('aggregates the same places whatever the order of the mentions', () => {
    const candidates = [
      loc('Chicago, Illinois', 'Chicago, Illinois', 0),
      loc('Springfield, Illinois', 'Springfield, Illinois', 30),
      { ...loc('Chicago, Illinois', 'Chicago, Illinois', 60), confidence: 2 },
      loc('New Orleans', 'New Orleans', 90),
    ]
    const summarize = (locations: LocationEntity[]) =>
      locations
        .map((l) => [l.placeId, l.confidence, l.count])
        .sort((a, b) => a[0] - b[0])

    const forward = resolveLocations(candidates, tables)
    const reversed = resolveLocations([...candidates].reverse(), tables)

    expect(summarize(forward.resolved)).toEqual([
      [CHICAGO, 4, 2],
      [SPRINGFIELD, 3, 1],
      [NEW_ORLEANS, 3, 1],
    ])
    expect(summarize(reversed.resolved)).toEqual(summarize(forward.resolved))
  })

  it('ignores other entity types and leaves its input alone', () => {
    const person: NamedEntity = { ...loc('Jackson'), type: 'Person' }
    const place = loc('New Orleans')

    const { resolved, unresolved } = resolveLocations([person, place], tables)

    expect(resolved).toHaveLength(1)
    expect(unresolved).toEqual([])
    expect(place.confidence).toBe(1)
    expect(place).not.toHaveProperty('stateCode')
  })
})

describe('lookUpState', () => {
  it('matches two-letter codes and name variants exactly', () => {
    expect(lookUpState('WA', states)).toBe(53)
    expect(lookUpState('Calif.', states)).toBe(6)
    expect(lookUpState('State of Ohio', states)).toBe(39)
    expect(lookUpState('Wash', states)).toBe(0)
    expect(lookUpState('A', states)).toBe(0)
  })

  it('prefers the longest contained variant when inexact', () => {
    expect(lookUpState('Charleston [West Virginia]', states, false)).toBe(54)
    expect(lookUpState('near Richmond, Virginia', states, false)).toBe(51)
    expect(lookUpState('upstate New York', states, false)).toBe(36)
  })

  it('never matches Washington by containment', () => {
    expect(lookUpState('Seattle, Washington', states, false)).toBe(0)
    expect(lookUpState('Olympia, Washington State', states, false)).toBe(53)
  })
})

describe('considerWashington', () => {
  it('finds the District or the state from clues', () => {
    expect(considerWashington('Washington, D.C.')).toBe(11)
    expect(considerWashington('metro Washington area')).toBe(11)
    expect(considerWashington('Washington [Tacoma]')).toBe(53)
    expect(considerWashington('Washington')).toBe(0)
  })

  it('prefers state clues over District clues', () => {
    expect(considerWashington('D.C. and Seattle')).toBe(53)
  })
})

describe('properName', () => {
  it('normalizes abbreviations and aliases', () => {
    expect(properName('Ft. Lewis')).toBe('Fort Lewis')
    expect(properName('Beale St.')).toBe('Beale Street')
    expect(properName('St. Louis')).toBe('Saint Louis')
    expect(properName('the City of Boston')).toBe('Boston')
    expect(properName('Travis AFB')).toBe('Travis Air Force Base')
    expect(properName('Philly')).toBe('Philadelphia')
    expect(properName('Pearl Harbor')).toBe('Naval Station Pearl Harbor')
    expect(properName('[Chicago]')).toBe('Chicago')
  })
})

describe('trimPlaceName', () => {
  it('keeps the text after the last annotation or separator', () => {
    expect(trimPlaceName('Selma [sic. Montgomery')).toBe('Montgomery')
    expect(trimPlaceName('St. Joseph Church, Birmingham')).toBe('Birmingham')
    expect(trimPlaceName('near: Mobile ')).toBe('Mobile')
  })
})

describe('parsePlaceNameAndState', () => {
  it('splits on the last comma', () => {
    expect(parsePlaceNameAndState('Church, Chicago, IL', states)).toEqual({
      placeName: 'Chicago',
      stateCode: 17,
    })
  })

  it('splits on the last bracket without a comma', () => {
    expect(parsePlaceNameAndState('Dayton [Ohio]', states)).toEqual({
      placeName: 'Dayton',
      stateCode: 39,
    })
  })

  it('gives up on text too short to split', () => {
    expect(parsePlaceNameAndState('Ohio', states)).toEqual({
      placeName: '',
      stateCode: 0,
    })
  })
})

describe('isGeneralLocation', () => {
  it('recognizes streets, rivers and lakes', () => {
    expect(isGeneralLocation('Wyoming', 'Wyoming [Wyoming Ave.]')).toBe(true)
    expect(isGeneralLocation('Hudson', 'Hudson River')).toBe(true)
    expect(isGeneralLocation('Lake Tahoe', '')).toBe(true)
    expect(isGeneralLocation('Lake Tahoe', 'Lake Tahoe [California]')).toBe(false)
    expect(isGeneralLocation('Wyoming', 'Wyoming')).toBe(false)
  })
})

describe('codeToAlpha', () => {
  it('returns the postal code for a known state', () => {
    expect(codeToAlpha(17, states)).toBe('IL')
    expect(codeToAlpha(3, states)).toBe('unknown')
  })
})
