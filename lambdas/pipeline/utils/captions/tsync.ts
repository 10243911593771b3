import type { CaptionCue, TSyncPair } from '../../types'
import { cueTimeStart, cueTranscriptOffsetStart } from './cues'

/**
 * Build the transcript sync table: one offset and time pair at the start of
 * the clip, one at the start of each cue, and one at the end.
 *
 * @param cues - Captioned cues
 * @param endOffset - Transcript length
 * @param endTime - Clip duration in milliseconds
 */
export function generateTSync(
  cues: CaptionCue[],
  endOffset: number,
  endTime: number,
): TSyncPair[] {
  return [
    { offset: 0, time: 0 },
    ...cues.map((cue) => ({
      offset: cueTranscriptOffsetStart(cue),
      time: cueTimeStart(cue),
    })),
    { offset: endOffset, time: endTime },
  ]
}
