import type { CaptionCue } from '../../types'
import { cueDuration, cueTimeEnd, cueTimeStart, lineText } from './cues'
import { formatCueTimestamp } from './formatting'

/**
 * Plain text dump of the cues for eyeballing caption quality.
 */
export function generateDiagnostic(cues: CaptionCue[]): string {
  let output = 'DIAGNOSTIC DUMP'

  cues.forEach((cue, i) => {
    output += `\n\ncue[${i}] - Duration: ${cueDuration(cue)}ms - ${formatCueTimestamp(cueTimeStart(cue))} --> ${formatCueTimestamp(cueTimeEnd(cue))}`
    cue.lines.forEach((line, j) => {
      output += `\n  line[${j}]: ${line.speaker}:${lineText(line)}`
    })
  })

  return output
}
