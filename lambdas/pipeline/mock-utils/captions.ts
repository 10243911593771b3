import type { CaptionCue, CueText, SpeakerId, TimedText } from '../types'

/**
 * Build an aligned word. Offsets into the full transcript default to the
 * paragraph offsets.
 */
export function timed(
  text: string,
  offsetStart: number,
  timeStart: number,
  timeEnd: number,
  originalStartOffset = offsetStart,
): TimedText {
  return {
    case: 'aligned',
    type: 'word',
    text,
    offsetStart,
    offsetEnd: offsetStart + text.length,
    originalStartOffset,
    originalEndOffset: originalStartOffset + text.length,
    timeStart,
    timeEnd,
  }
}

export function line(speaker: SpeakerId, words: TimedText[]): CueText {
  return { speaker, words }
}

/**
 * Two cues: a single S1 line, then an S2 line followed by an S1 line.
 */
export function sampleCues(): CaptionCue[] {
  return [
    {
      lines: [
        line('S1', [timed('Hello ', 0, 0, 500), timed('there.', 6, 500, 1500)]),
      ],
    },
    {
      lines: [
        line('S2', [
          timed('Fish ', 0, 2000, 2500, 14),
          timed('& ', 5, 2500, 2800, 19),
          timed('chips', 7, 2800, 3200, 21),
        ]),
        line('S1', [timed('Yes?', 0, 3300, 4000, 40)]),
      ],
    },
  ]
}
