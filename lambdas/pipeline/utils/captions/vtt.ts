import { cueTimeEnd, cueTimeStart, lineText } from './cues'
import { escapeHtml, formatCueTimestamp } from './formatting'
import type { GeneratorOptions } from './types'

/**
 * Generate WebVTT captions with one voice span per caption line.
 *
 * @param options - Cues and the NOTE text
 * @returns VTT formatted string
 */
export function generateVtt({ cues, note }: GeneratorOptions): string {
  let output = `WEBVTT\n\nNOTE ${note}`

  for (const cue of cues) {
    output += `\n\n${formatCueTimestamp(cueTimeStart(cue))} --> ${formatCueTimestamp(cueTimeEnd(cue))}`
    for (const line of cue.lines) {
      output += `\n<v ${line.speaker}>${escapeHtml(lineText(line))}`
    }
  }

  return output
}
