import type { CaptionCue, CueText } from '../../types'

// Derived values for caption lines and cues. An empty line or cue measures zero.

export function lineTimeStart(line: CueText): number {
  return line.words[0]?.timeStart ?? 0
}

export function lineTimeEnd(line: CueText): number {
  return line.words[line.words.length - 1]?.timeEnd ?? 0
}

export function lineDuration(line: CueText): number {
  return lineTimeEnd(line) - lineTimeStart(line)
}

/**
 * Characters spanned by the line, measured on word offsets
 */
export function lineLength(line: CueText): number {
  const first = line.words[0]
  const last = line.words[line.words.length - 1]
  if (!first || !last) return 0
  return last.offsetEnd - first.offsetStart
}

export function lineText(line: CueText): string {
  return line.words
    .map((w) => w.text)
    .join('')
    .trim()
}

export function cueTimeStart(cue: CaptionCue): number {
  const first = cue.lines[0]
  return first ? lineTimeStart(first) : 0
}

export function cueTimeEnd(cue: CaptionCue): number {
  const last = cue.lines[cue.lines.length - 1]
  return last ? lineTimeEnd(last) : 0
}

export function cueDuration(cue: CaptionCue): number {
  return cueTimeEnd(cue) - cueTimeStart(cue)
}

/**
 * Offset into the full transcript of the first word of the cue
 */
export function cueTranscriptOffsetStart(cue: CaptionCue): number {
  return cue.lines[0]?.words[0]?.originalStartOffset ?? 0
}

/**
 * Offset into the full transcript just past the last word of the cue
 */
export function cueTranscriptOffsetEnd(cue: CaptionCue): number {
  const last = cue.lines[cue.lines.length - 1]
  return last?.words[last.words.length - 1]?.originalEndOffset ?? 0
}
