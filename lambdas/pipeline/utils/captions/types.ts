import type { CaptionCue } from '../../types'

/**
 * Options passed to the WebVTT generator.
 */
export interface GeneratorOptions {
  /** Cues produced by the captioner, in display order */
  cues: CaptionCue[]
  /** Text written in the NOTE block after the header */
  note: string
}
