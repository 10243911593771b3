import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { EntityResolutionConfigSchema } from '@oral-history/config'
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest'
import { logger } from '../lib/lambda-common'
import {
  loadCityHints,
  loadCorporateNames,
  loadCorporateSynonyms,
  loadLocationReferenceData,
  loadOrganizationReferenceData,
  loadPlacesInStates,
  loadStateTable,
  ReferenceDataError,
} from './reference-data'

let dir: string

function table(name: string, ...lines: string[]): string {
  const path = join(dir, name)
  writeFileSync(path, `${lines.join('\n')}\n`)
  return path
}

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), 'reference-data-'))
})

afterAll(() => {
  rmSync(dir, { recursive: true, force: true })
})

afterEach(() => {
  vi.restoreAllMocks()
})

describe('loadStateTable', () => {
  it('loads the states and the District ordered by ID', () => {
    const states = loadStateTable()

    expect(states).toHaveLength(51)
    expect(states[0]).toEqual({
      stateId: 1,
      usgsId: 1779775,
      alpha: 'AL',
      names: ['Alabama', 'State of Alabama'],
    })
    expect(states.find((s) => s.alpha === 'DC')?.names).toEqual([
      'District of Columbia',
      'D.C.',
      'the District of Columbia',
    ])
  })
})

describe('loadPlacesInStates', () => {
  it('skips malformed, unknown-state and redundant rows with a warning', () => {
    const warn = vi.spyOn(logger, 'warn')
    const path = table(
      'places.txt',
      'ID\tName\tState',
      '1000017\tSpringfield\t17',
      'not a place',
      '1000099\tSpringfield\t17',
      'x\tPeoria\t17',
      '5\tNowhere\t3',
      '423587\tChicago\t17',
    )

    const places = loadPlacesInStates(path, loadStateTable())

    expect(places.size).toBe(51)
    expect([...(places.get(17) ?? [])]).toEqual([
      ['Springfield', 1000017],
      ['Chicago', 423587],
    ])
    expect(places.get(3)).toBeUndefined()
    expect(warn).toHaveBeenCalledTimes(4)
    expect(warn).toHaveBeenCalledWith('Ignoring redundant place', {
      row: '1000099\tSpringfield\t17',
    })
  })

  it('throws when the file is missing', () => {
    expect(() =>
      loadPlacesInStates(join(dir, 'missing.txt'), loadStateTable()),
    ).toThrow(ReferenceDataError)
  })

  it('throws when the file has no header', () => {
    const path = join(dir, 'empty.txt')
    writeFileSync(path, '')

    expect(() => loadPlacesInStates(path, loadStateTable())).toThrow(
      `Required places file is empty: ${path}`,
    )
  })
})

describe('loadCityHints', () => {
  it('keeps the first hint per city', () => {
    const warn = vi.spyOn(logger, 'warn')
    const path = table(
      'hints.txt',
      'Name\tAlpha\tState\tPlace',
      'New Orleans\tLA\t22\t1629985',
      'New Orleans\tLA\t22\t1',
      'Akron\tOH\tx\t1064305',
    )

    const hints = loadCityHints(path)

    expect([...hints]).toEqual([
      ['New Orleans', { stateCode: 22, placeId: 1629985 }],
    ])
    expect(warn).toHaveBeenCalledWith('Ignoring repeated city hint', {
      row: 'New Orleans\tLA\t22\t1',
    })
    expect(warn).toHaveBeenCalledWith('Ignoring malformed city hint', {
      row: 'Akron\tOH\tx\t1064305',
    })
  })
})

describe('loadCorporateNames', () => {
  it('trims names and skips empty, malformed and redundant rows', () => {
    const warn = vi.spyOn(logger, 'warn')
    const path = table(
      'names.txt',
      'Name\tID',
      'Carnegie-Mellon University \tn79054102',
      ' \tn00000001',
      'Three\tcolumns\there',
      'Carnegie-Mellon University\tn00000002',
    )

    const names = loadCorporateNames(path)

    expect([...names]).toEqual([['Carnegie-Mellon University', 'n79054102']])
    expect(warn).toHaveBeenCalledTimes(3)
  })
})

describe('loadCorporateSynonyms', () => {
  it('maps each synonym to the authority ID', () => {
    const warn = vi.spyOn(logger, 'warn')
    const path = table(
      'synonyms.txt',
      'Synonym\tCanonical\tID',
      'Carnegie Mellon\tCarnegie-Mellon University\tn79054102',
      'CMU\t\tn79054102',
      'Two\tcolumns',
    )

    const synonyms = loadCorporateSynonyms(path)

    expect([...synonyms]).toEqual([
      ['Carnegie Mellon', 'n79054102'],
      ['CMU', 'n79054102'],
    ])
    expect(warn).toHaveBeenCalledWith('Ignoring malformed corporate synonym', {
      row: 'Two\tcolumns',
    })
  })
})

describe('reference data sets', () => {
  it('resolves file names against an absolute data path', () => {
    table('p.txt', 'header', '1000017\tSpringfield\t17')
    table('h.txt', 'header', 'Akron\tOH\t39\t1064305')
    table('n.txt', 'header', 'Carnegie-Mellon University\tn79054102')
    table('s.txt', 'header', 'CMU\tCarnegie-Mellon University\tn79054102')
    const config = EntityResolutionConfigSchema.parse({
      dataPath: dir,
      placesFile: 'p.txt',
      cityHintsFile: 'h.txt',
      corporateNamesFile: 'n.txt',
      corporateSynonymsFile: 's.txt',
    })

    const locations = loadLocationReferenceData(config, '/ignored')
    const organizations = loadOrganizationReferenceData(config, '/ignored')

    expect(locations.places.get(17)?.get('Springfield')).toBe(1000017)
    expect(locations.cityHints.get('Akron')).toEqual({
      stateCode: 39,
      placeId: 1064305,
    })
    expect(organizations.corporateNames.get('Carnegie-Mellon University')).toBe(
      'n79054102',
    )
    expect(organizations.corporateSynonyms.get('CMU')).toBe('n79054102')
  })

  it('loads the bundled sample tables relative to the base directory', () => {
    const locations = loadLocationReferenceData(
      EntityResolutionConfigSchema.parse({}),
      join(__dirname, '..'),
    )

    expect(locations.cityHints.get('New Orleans')).toEqual({
      stateCode: 22,
      placeId: 1629985,
    })
  })
})
