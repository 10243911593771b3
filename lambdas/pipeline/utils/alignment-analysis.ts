import { logger } from '../lib/lambda-common'
import type { AlignmentResult } from '../types'

/**
 * How well a single aligner pass matched the audio
 */
export interface AlignmentStats {
  /** Words the aligner could not find in the audio */
  unaligned: number
  /** Longest run of consecutive unaligned words */
  maxConsecutive: number
}

export interface AlignmentSelection {
  selected: 'first' | 'second'
  result: AlignmentResult
  stats: AlignmentStats
}

/**
 * Count unaligned words in an aligner pass. Disfluencies the aligner could
 * not place in the transcript are ignored.
 */
export function analyzeAlignment(result: AlignmentResult): AlignmentStats {
  // Likely no narration in the audio
  if (!result.words) return { unaligned: 0, maxConsecutive: 0 }

  let unaligned = 0
  let consecutive = 0
  let maxConsecutive = 0

  for (const word of result.words) {
    switch (word.case) {
      case 'not-found-in-audio':
        unaligned++
        consecutive++
        break
      case 'not-found-in-transcript':
        logger.debug('Ignoring disfluency in alignment data', {
          word: word.word,
        })
        break
      default:
        if (word.case !== 'success') {
          logger.warn('Found unknown case in alignment data', {
            case: word.case,
          })
        }
        maxConsecutive = Math.max(consecutive, maxConsecutive)
        consecutive = 0
    }
  }

  return { unaligned, maxConsecutive: Math.max(consecutive, maxConsecutive) }
}

/**
 * Pick between a default aligner pass and an optional conservative pass.
 * Fewer unaligned words wins; on a tie the shorter longest run wins, and the
 * first pass wins a further tie.
 */
export function selectAlignment(
  first: AlignmentResult,
  second?: AlignmentResult,
): AlignmentSelection {
  const firstStats = analyzeAlignment(first)
  logger.info('Analyzed default alignment pass', { ...firstStats })

  if (!second || firstStats.unaligned === 0) {
    return { selected: 'first', result: first, stats: firstStats }
  }

  const secondStats = analyzeAlignment(second)
  logger.info('Analyzed conservative alignment pass', { ...secondStats })

  const useFirst =
    firstStats.unaligned === secondStats.unaligned
      ? firstStats.maxConsecutive <= secondStats.maxConsecutive
      : firstStats.unaligned < secondStats.unaligned

  const selection: AlignmentSelection = useFirst
    ? { selected: 'first', result: first, stats: firstStats }
    : { selected: 'second', result: second, stats: secondStats }

  logger.info('Selected alignment pass', { selected: selection.selected })

  return selection
}
