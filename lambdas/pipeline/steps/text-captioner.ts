import type { AlignmentConfig, CaptioningConfig } from '@oral-history/config'
import { logger } from '../lib/lambda-common'
import type {
  AlignmentResult,
  CaptionCue,
  CaptionValidation,
  CueText,
  FormattedAlignment,
  SpeakerId,
  TextCaptions,
} from '../types'
import { NO_NARRATION } from '../types'
import { cueDuration, lineDuration, lineLength } from '../utils/captions'
import { ok, type Result } from '../utils/result'
import { formatAlignment } from './alignment-formatter'

/**
 * Guess which speaker leads from the characters spoken in even and odd
 * paragraphs. S1 is the interviewer, S2 the subject.
 */
export function determineSpeakerOrder(
  alignment: FormattedAlignment,
  config: CaptioningConfig,
): [SpeakerId, SpeakerId] {
  const charCount = [0, 0]
  alignment.paragraphs.forEach((paragraph, i) => {
    charCount[i % 2] += paragraph.text.length
  })

  const ratio = charCount[1] === 0 ? 0 : Math.trunc(charCount[0] / charCount[1])

  return ratio < config.speaker1ToSpeaker2CharRatio ? ['S1', 'S2'] : ['S2', 'S1']
}

/**
 * Break a paragraph that is too long to show at once into lines, closing a
 * line on target length, then target duration, then running out of words.
 * A short tail is folded into the line just closed when it fits.
 */
function splitParagraph(
  speaker: SpeakerId,
  words: CueText['words'],
  config: CaptioningConfig,
): CueText[] {
  const lines: CueText[] = []
  const remaining: CueText = { speaker, words: [...words] }
  let current: CueText = { speaker, words: [] }

  while (remaining.words.length > 0) {
    const next = remaining.words.shift()
    if (next) current.words.push(next)

    if (
      lineLength(current) >= config.targetLength ||
      lineDuration(current) >= config.targetDuration ||
      remaining.words.length === 0
    ) {
      if (
        remaining.words.length > 0 &&
        lineDuration(remaining) < config.minCueDuration &&
        lineDuration(remaining) + lineDuration(current) < config.maxCueDuration
      ) {
        current.words.push(...remaining.words)
        remaining.words = []
      }

      lines.push(current)
      current = { speaker, words: [] }
    }
  }

  return lines
}

/**
 * First pass: one line per paragraph, or several for paragraphs that are too
 * long, each wrapped in its own cue.
 */
function generateCues(
  alignment: FormattedAlignment,
  config: CaptioningConfig,
): CaptionCue[] {
  const speakers = determineSpeakerOrder(alignment, config)
  const lines: CueText[] = []

  alignment.paragraphs.forEach((paragraph, i) => {
    const speaker = speakers[i % 2]
    const line: CueText = { speaker, words: [...paragraph.words] }

    if (paragraph.text === NO_NARRATION) {
      lines.push({ speaker: '', words: [...paragraph.words] })
    } else if (
      lineDuration(line) > config.maxCueDuration ||
      paragraph.text.length > config.maxCueLength
    ) {
      lines.push(...splitParagraph(speaker, paragraph.words, config))
    } else {
      lines.push(line)
    }
  })

  return lines.map((line) => ({ lines: [line] }))
}

/**
 * Append the source lines to the target, then merge neighbouring lines that
 * share a speaker in a single forward pass.
 */
function combineCues(target: CaptionCue, source: CaptionCue): void {
  target.lines.push(...source.lines)

  const lines = target.lines
  for (let i = 0; i < lines.length - 1; i++) {
    if (lines[i].speaker === lines[i + 1].speaker) {
      lines[i] = {
        speaker: lines[i].speaker,
        words: [...lines[i].words, ...lines[i + 1].words],
      }
      lines.splice(i + 1, 1)
    }
  }
}

/**
 * Second pass: fold cues shorter than the minimum into a neighbour. When both
 * neighbours qualify the shorter one is used, the previous cue on a tie.
 */
function coalescingPass(cues: CaptionCue[], config: CaptioningConfig): void {
  const isEligible = (neighbour: CaptionCue | undefined, cue: CaptionCue) =>
    neighbour !== undefined &&
    cueDuration(neighbour) + cueDuration(cue) < config.maxCueDuration &&
    neighbour.lines.length < config.maxCueLineCount

  for (let i = 0; i < cues.length; i++) {
    const cue = cues[i]
    if (cueDuration(cue) >= config.minCueDuration) continue

    const prev = i > 0 ? cues[i - 1] : undefined
    const next = i < cues.length - 1 ? cues[i + 1] : undefined
    const prevEligible = isEligible(prev, cue)
    const nextEligible = isEligible(next, cue)

    if (
      prev &&
      prevEligible &&
      (!nextEligible || !next || cueDuration(prev) <= cueDuration(next))
    ) {
      logger.debug('Combining cue with previous cue', { index: i })
      combineCues(prev, cue)
      cues.splice(i, 1)
      i -= 1
    } else if (next && nextEligible) {
      logger.debug('Combining cue with next cue', { index: i })
      combineCues(cue, next)
      cues.splice(i + 1, 1)
    } else {
      logger.warn('Cue too short but no suitable neighbours for combining', {
        index: i,
        duration: cueDuration(cue),
      })
    }
  }
}

/**
 * Third pass: count cues and lines outside the configured bounds. Nothing is
 * changed.
 */
export function validationPass(
  cues: CaptionCue[],
  config: CaptioningConfig,
): CaptionValidation {
  const validation: CaptionValidation = {
    durationTooShort: 0,
    durationTooLong: 0,
    lineCountTooFew: 0,
    lineCountTooMany: 0,
    lineTextMissing: 0,
    lineLengthTooLong: 0,
    total: 0,
  }

  logger.info('Validating cues', { count: cues.length })

  cues.forEach((cue, index) => {
    const duration = cueDuration(cue)
    const lineCount = cue.lines.length

    if (duration < config.minCueDuration) {
      validation.durationTooShort++
      logger.warn('Cue duration below minimum', {
        index,
        duration,
        minCueDuration: config.minCueDuration,
      })
    }
    if (duration > config.maxCueDuration) {
      validation.durationTooLong++
      logger.warn('Cue duration above maximum', {
        index,
        duration,
        maxCueDuration: config.maxCueDuration,
      })
    }
    if (lineCount < 1) {
      validation.lineCountTooFew++
      logger.warn('Cue has no lines', { index })
    }
    if (lineCount > config.maxCueLineCount) {
      validation.lineCountTooMany++
      logger.warn('Cue line count above maximum', {
        index,
        lineCount,
        maxCueLineCount: config.maxCueLineCount,
      })
    }

    cue.lines.forEach((line, lineIndex) => {
      const length = lineLength(line)
      if (length === 0) {
        validation.lineTextMissing++
        logger.warn('Cue line has no text', { index, lineIndex })
      }
      if (length > config.maxCueLength) {
        validation.lineLengthTooLong++
        logger.warn('Cue line length above maximum', {
          index,
          lineIndex,
          length,
          maxCueLength: config.maxCueLength,
        })
      }
    })
  })

  validation.total =
    validation.durationTooShort +
    validation.durationTooLong +
    validation.lineCountTooFew +
    validation.lineCountTooMany +
    validation.lineTextMissing +
    validation.lineLengthTooLong

  logger.info('Validation complete', { ...validation })

  return validation
}

/**
 * Generate speaker-attributed caption cues from forced aligner output.
 *
 * Cue boundaries follow a greedy heuristic: paragraphs become lines, long
 * paragraphs are split on target length and duration, and short cues are
 * merged into their neighbours. Problems that remain are counted, not fixed.
 *
 * @param alignment - Aligner output
 * @param durationMs - Known duration of the clip
 * @param config - Alignment and captioning configuration
 * @returns Cues, the transcript they refer to and validation counts, or the
 * formatter's failure
 */
export function captionText(
  alignment: AlignmentResult,
  durationMs: number,
  config: { alignment: AlignmentConfig; captioning: CaptioningConfig },
): Result<TextCaptions> {
  const formatted = formatAlignment(alignment, durationMs, config.alignment)
  if (!formatted.ok) return formatted

  logger.info('Captioner: initial pass')
  const cues = generateCues(formatted.value, config.captioning)

  logger.info('Captioner: combining pass', { cues: cues.length })
  coalescingPass(cues, config.captioning)

  logger.info('Captioner: validation pass', { cues: cues.length })
  const validation = validationPass(cues, config.captioning)

  return ok({ cues, transcript: formatted.value.transcript, validation })
}
