import { afterEach, describe, expect, it, vi } from 'vitest'
import { logger } from '../lib/lambda-common'
import type { AlignmentResult } from '../types'
import { analyzeAlignment, selectAlignment } from './alignment-analysis'

const A = 'success'
const U = 'not-found-in-audio'
const D = 'not-found-in-transcript'

function pass(...cases: string[]): AlignmentResult {
  return {
    transcript: 'placeholder',
    words: cases.map((c, i) => ({
      case: c,
      word: `w${i}`,
      startOffset: 0,
      endOffset: 0,
    })),
  }
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('analyzeAlignment', () => {
  it('counts unaligned words and the longest interior run', () => {
    expect(analyzeAlignment(pass(A, U, U, A, U, A))).toEqual({
      unaligned: 3,
      maxConsecutive: 2,
    })
  })

  it('counts a trailing run toward the longest run', () => {
    expect(analyzeAlignment(pass(A, U, A, U, U, U))).toEqual({
      unaligned: 4,
      maxConsecutive: 3,
    })
  })

  it('ignores disfluencies', () => {
    expect(analyzeAlignment(pass(U, D, U, A))).toEqual({
      unaligned: 2,
      maxConsecutive: 2,
    })
  })

  it('treats an unknown case as aligned and warns', () => {
    const warn = vi.spyOn(logger, 'warn')

    expect(analyzeAlignment(pass(U, 'mystery', U))).toEqual({
      unaligned: 2,
      maxConsecutive: 1,
    })
    expect(warn).toHaveBeenCalledWith('Found unknown case in alignment data', {
      case: 'mystery',
    })
  })

  it('reports nothing for a missing word list', () => {
    expect(analyzeAlignment({ transcript: '' })).toEqual({
      unaligned: 0,
      maxConsecutive: 0,
    })
  })
})

describe('selectAlignment', () => {
  it('keeps the first pass when there is no second pass', () => {
    const first = pass(A, U)

    expect(selectAlignment(first)).toEqual({
      selected: 'first',
      result: first,
      stats: { unaligned: 1, maxConsecutive: 1 },
    })
  })

  it('keeps a perfect first pass without looking at the second', () => {
    const first = pass(A, A)

    expect(selectAlignment(first, pass(A, A)).selected).toBe('first')
  })

  it('prefers the pass with fewer unaligned words', () => {
    const second = pass(A, U, A)
    const selection = selectAlignment(pass(U, U, A), second)

    expect(selection.selected).toBe('second')
    expect(selection.result).toBe(second)
  })

  it('breaks a tie on the longest run', () => {
    expect(selectAlignment(pass(U, U, A), pass(U, A, U)).selected).toBe('second')
  })

  it('keeps the first pass on a full tie', () => {
    expect(selectAlignment(pass(U, A), pass(A, U)).selected).toBe('first')
  })
})
