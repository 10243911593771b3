import type { AlignmentConfig } from '@oral-history/config'
import { logger } from '../lib/lambda-common'
import type {
  AlignedParagraph,
  AlignmentResult,
  FormattedAlignment,
  TimedText,
  TimedTextCase,
  WordResult,
} from '../types'
import { NO_NARRATION } from '../types'
import { fail, ok, type Result } from '../utils/result'

/**
 * Convert seconds reported by the aligner to the nearest whole millisecond
 */
function toMilliseconds(seconds: number | undefined): number {
  return seconds === undefined ? 0 : Math.round(seconds * 1000)
}

/**
 * Build the mutable word list the repair and interpolation passes work on.
 * Words the aligner could not find in the transcript carry no offsets we can use.
 */
function toTimedText(words: WordResult[]): TimedText[] {
  const timed: TimedText[] = []

  for (const word of words) {
    if (word.case === 'not-found-in-transcript') {
      logger.warn('Dropping word not found in transcript', { word: word.word })
      continue
    }

    timed.push({
      case: word.case === 'success' ? 'aligned' : 'unaligned',
      type: 'word',
      text: word.word,
      offsetStart: word.startOffset,
      offsetEnd: word.endOffset,
      originalStartOffset: word.startOffset,
      originalEndOffset: word.endOffset,
      timeStart: toMilliseconds(word.start),
      timeEnd: toMilliseconds(word.end),
    })
  }

  return timed
}

/**
 * The single synthetic paragraph produced for a clip with no spoken words.
 */
function noNarration(durationMs: number): FormattedAlignment {
  return {
    transcript: NO_NARRATION,
    paragraphs: [
      {
        originalStartOffset: 0,
        originalEndOffset: NO_NARRATION.length,
        originalText: NO_NARRATION,
        text: NO_NARRATION,
        words: [
          {
            case: 'interpolated',
            type: 'no-narration',
            text: NO_NARRATION,
            offsetStart: 0,
            offsetEnd: NO_NARRATION.length,
            originalStartOffset: 0,
            originalEndOffset: NO_NARRATION.length,
            timeStart: 0,
            timeEnd: durationMs,
          },
        ],
      },
    ],
  }
}

// =============================================================================
// Bug repair
// =============================================================================

/**
 * Spread `[startTime, endTime)` evenly over the given words, chaining each
 * word's start to the previous word's end.
 */
export function interpolateRange(
  range: TimedText[],
  startTime: number,
  endTime: number,
  wordCase: TimedTextCase = 'interpolated',
): void {
  if (range.length === 0) return

  const wordDuration = Math.trunc((endTime - startTime) / range.length)
  let time = startTime
  for (const word of range) {
    word.case = wordCase
    word.timeStart = time
    word.timeEnd = time + wordDuration
    time = word.timeEnd
  }
}

/**
 * Overwrite the times of any word that is out of order with the times found
 * at the same position in a time-sorted copy. The list itself is not reordered.
 */
function fixNonMonotonicStartTimes(aligned: TimedText[]): void {
  const timeSorted = [...aligned].sort((a, b) => a.timeStart - b.timeStart)
  const sortedTimes = timeSorted.map((w) => ({
    timeStart: w.timeStart,
    timeEnd: w.timeEnd,
  }))

  for (let i = 0; i < aligned.length - 1; i++) {
    if (aligned[i] !== timeSorted[i]) {
      aligned[i].timeStart = sortedTimes[i].timeStart
      aligned[i].timeEnd = sortedTimes[i].timeEnd
    }
  }
}

/**
 * Swap the end of a word with the start of the next one when they overlap.
 * The final pair is left alone.
 */
function fixOverlappingWordTimes(aligned: TimedText[]): void {
  for (let i = 0; i < aligned.length - 2; i++) {
    if (aligned[i].timeEnd > aligned[i + 1].timeStart) {
      const cachedEnd = aligned[i].timeEnd
      aligned[i].timeEnd = aligned[i + 1].timeStart
      aligned[i + 1].timeStart = cachedEnd
    }
  }
}

/**
 * Re-time words that end past the clip duration, from the last word that fits.
 * When no word fits, every aligned word is spread over the whole clip.
 */
function fixIllegalEndTimes(aligned: TimedText[], durationMs: number): void {
  const lastIndex = aligned.length - 1
  let lastGoodIndex = -1

  for (let i = lastIndex; i >= 0; i--) {
    if (aligned[i].timeEnd <= durationMs) {
      lastGoodIndex = i
      break
    }
  }

  if (lastGoodIndex === lastIndex) return

  logger.warn('Re-timing words past the end of the clip', {
    count: lastIndex - lastGoodIndex,
    durationMs,
  })
  const from = Math.max(lastGoodIndex, 0)
  const startTime =
    lastGoodIndex < 0 ? 0 : Math.min(aligned[from].timeStart, durationMs)
  interpolateRange(aligned.slice(from), startTime, durationMs, 'aligned')
}

function fixKnownDataBugs(words: TimedText[], durationMs: number): void {
  // Word objects are shared, so repairs on the subset land in `words`
  const aligned = words.filter((w) => w.case === 'aligned')

  if (aligned.length > 1) {
    fixNonMonotonicStartTimes(aligned)
    fixOverlappingWordTimes(aligned)
  }

  if (aligned.length > 0) {
    fixIllegalEndTimes(aligned, durationMs)
  }
}

// =============================================================================
// Interpolation
// =============================================================================

/**
 * Estimate times for runs of unaligned words and drop a trailing run that is
 * too long to guess. Mutates `words`.
 *
 * @returns The transcript, truncated when a trailing run was dropped
 */
function interpolateUnalignedWordTimes(
  words: TimedText[],
  durationMs: number,
  transcript: string,
  config: AlignmentConfig,
): string {
  let priorCase: TimedTextCase = 'aligned'
  let startTime = 0
  let startIndex = 0
  const maxIndex = words.length - 1

  for (let i = 0; i <= maxIndex; i++) {
    const currentCase = words[i].case

    if (priorCase === 'aligned') {
      if (currentCase === 'aligned') {
        startTime = words[i].timeEnd
      } else {
        startIndex = i
        if (i === maxIndex) {
          interpolateRange(words.slice(startIndex, i + 1), startTime, durationMs)
        }
      }
    } else if (currentCase === 'aligned') {
      interpolateRange(
        words.slice(startIndex, i),
        startTime,
        words[i].timeStart,
      )
    } else if (i === maxIndex) {
      const count = maxIndex - startIndex + 1

      if (count > config.maxUnalignedTrailingWordsAllowed) {
        logger.warn('Truncating unaligned words from end of transcript', {
          count,
        })
        transcript = transcript.substring(0, words[startIndex].offsetStart)
        words.splice(startIndex, count)
        break
      }

      interpolateRange(words.slice(startIndex), startTime, durationMs)
    }

    priorCase = currentCase
  }

  return transcript
}

// =============================================================================
// Paragraphs
// =============================================================================

/**
 * Drop `[...]` and `(...)` passages. A passage ends at the first closing
 * character of its kind, whatever it contains.
 */
function removeBrackets(text: string): string {
  let result = ''
  let closingBracket: string | undefined

  for (const c of text) {
    if (closingBracket) {
      if (c === closingBracket) closingBracket = undefined
    } else if (c === '[') {
      closingBracket = ']'
    } else if (c === '(') {
      closingBracket = ')'
    } else {
      result += c
    }
  }

  return result
}

/**
 * Remove bracketed passages and tighten up whitespace.
 */
export function cleanText(text: string): string {
  return removeBrackets(text)
    .replace(/\s+/g, ' ')
    .replace(/\s(?=[.?,;!])/g, '')
    .trim()
}

/**
 * Point each word at its position in the cleaned paragraph text, searching
 * forward from the end of the previous word.
 */
function repairWordOffsets(
  paragraph: AlignedParagraph,
): Result<AlignedParagraph> {
  let priorWordEnd = 0

  for (const word of paragraph.words) {
    const found = paragraph.text.indexOf(word.text, priorWordEnd)
    if (found < 0) {
      return fail({
        kind: 'offset-relocation',
        message: `No match found for '${word.text}' in paragraph text`,
        word: word.text,
        paragraph: paragraph.text,
      })
    }

    word.offsetStart = found
    word.offsetEnd = found + word.text.length
    priorWordEnd = word.offsetEnd
  }

  return ok(paragraph)
}

/**
 * Expand word boundaries so the words cover the paragraph text without gaps.
 * Leading quotes join their word and hyphenated runs become one word. The
 * first word starts at the paragraph start and every word runs up to the
 * start of the next.
 */
function expandWordBoundaries(paragraph: AlignedParagraph): void {
  const { text, words } = paragraph

  for (const word of words) {
    const pos = word.offsetStart - 1
    if (pos >= 0 && text[pos] === '"') {
      word.offsetStart = pos
    }
  }

  let i = 0
  while (i < words.length - 1) {
    const current = words[i]
    const next = words[i + 1]
    if (
      next.offsetStart - current.offsetEnd === 1 &&
      text[current.offsetEnd] === '-'
    ) {
      current.offsetEnd = next.offsetEnd
      current.originalEndOffset = next.originalEndOffset
      current.timeEnd = next.timeEnd
      current.text = text.substring(current.offsetStart, current.offsetEnd)
      words.splice(i + 1, 1)
    } else {
      i++
    }
  }

  if (words.length > 0) {
    words[0].offsetStart = 0
  }

  for (let j = 0; j < words.length; j++) {
    const word = words[j]
    word.offsetEnd = j + 1 < words.length ? words[j + 1].offsetStart : text.length
    word.text = text.substring(word.offsetStart, word.offsetEnd)
  }
}

/**
 * Split the transcript on blank lines and hand each paragraph the words whose
 * offsets fall inside it. A single pointer walks the words once.
 */
function generateParagraphs(
  words: TimedText[],
  transcript: string,
): Result<AlignedParagraph[]> {
  const paragraphs: AlignedParagraph[] = []
  let startOffset = 0

  for (const item of transcript.split('\n\n')) {
    const endOffset = startOffset + item.length
    paragraphs.push({
      originalStartOffset: startOffset,
      originalEndOffset: endOffset,
      originalText: item,
      text: item,
      words: [],
    })
    startOffset = endOffset + 2
  }

  let priorIndex = 0
  for (const paragraph of paragraphs) {
    for (let i = priorIndex; i < words.length; i++) {
      if (words[i].offsetStart < paragraph.originalStartOffset) continue

      if (words[i].offsetEnd <= paragraph.originalEndOffset) {
        paragraph.words.push(words[i])
      } else {
        priorIndex = i
        break
      }
    }
  }

  for (const paragraph of paragraphs) {
    paragraph.text = cleanText(paragraph.text)

    const repaired = repairWordOffsets(paragraph)
    if (!repaired.ok) return repaired

    expandWordBoundaries(paragraph)
  }

  return ok(paragraphs)
}

/**
 * Convert forced aligner output into caption-ready paragraphs.
 *
 * Timing bugs in the aligned words are repaired, unaligned words get
 * interpolated times, and the transcript is broken into cleaned paragraphs
 * whose words cover the paragraph text from start to end.
 *
 * @param alignment - Aligner output, left untouched
 * @param durationMs - Known duration of the clip
 * @param config - Alignment configuration
 * @returns The formatted alignment, or an `offset-relocation` failure when a
 * word cannot be found in its cleaned paragraph
 */
export function formatAlignment(
  alignment: AlignmentResult,
  durationMs: number,
  config: AlignmentConfig,
): Result<FormattedAlignment> {
  const words = toTimedText(alignment.words ?? [])

  if (words.length === 0) {
    logger.info('No narration found, generating placeholder paragraph', {
      durationMs,
    })
    return ok(noNarration(durationMs))
  }

  fixKnownDataBugs(words, durationMs)
  const transcript = interpolateUnalignedWordTimes(
    words,
    durationMs,
    alignment.transcript,
    config,
  )

  const paragraphs = generateParagraphs(words, transcript)
  if (!paragraphs.ok) {
    logger.error('Unable to relocate word in cleaned paragraph', {
      error: paragraphs.error,
    })
    return paragraphs
  }

  logger.info('Formatted alignment', {
    paragraphs: paragraphs.value.length,
    words: words.length,
  })

  return ok({ paragraphs: paragraphs.value, transcript })
}
