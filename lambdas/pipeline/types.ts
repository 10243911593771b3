import { z } from 'zod'

// =============================================================================
// Forced aligner output (consumed as given)
// =============================================================================

export const WordResultSchema = z.object({
  /** Aligner verdict: success, not-found-in-audio or not-found-in-transcript */
  case: z.string(),
  /** The word as it appears in the transcript */
  word: z.string(),
  /** Character offset of the word in the full transcript */
  startOffset: z.number().int().default(0),
  /** Character offset one past the end of the word */
  endOffset: z.number().int().default(0),
  /** Start time in seconds (absent when the word could not be aligned) */
  start: z.number().optional(),
  /** End time in seconds (absent when the word could not be aligned) */
  end: z.number().optional(),
})

export type WordResult = z.infer<typeof WordResultSchema>

export const AlignmentResultSchema = z.object({
  /** The full transcript the word offsets refer to */
  transcript: z.string(),
  /** Per-word results; absent or empty when nothing was narrated */
  words: z.array(WordResultSchema).optional(),
})

export type AlignmentResult = z.infer<typeof AlignmentResultSchema>

// =============================================================================
// Formatted alignment
// =============================================================================

/** Synthetic paragraph text used when a clip has no spoken words */
export const NO_NARRATION = '(no narration)'

export type TimedTextCase = 'aligned' | 'unaligned' | 'interpolated'

/** One word (or span) with paragraph-relative offsets and timing in milliseconds */
export interface TimedText {
  case: TimedTextCase
  type: 'word' | 'no-narration'
  text: string
  offsetStart: number
  offsetEnd: number
  /** Offsets into the full transcript, as first reported by the aligner */
  originalStartOffset: number
  originalEndOffset: number
  timeStart: number
  timeEnd: number
}

export interface AlignedParagraph {
  /** Offset range of the paragraph within the (possibly truncated) transcript */
  originalStartOffset: number
  originalEndOffset: number
  originalText: string
  /** Display text after bracket and whitespace cleanup */
  text: string
  /** Words with offsets relative to `text`, contiguous after boundary expansion */
  words: TimedText[]
}

export interface FormattedAlignment {
  paragraphs: AlignedParagraph[]
  /** Transcript the paragraphs were cut from; shorter than the input when a trailing run was dropped */
  transcript: string
}

// =============================================================================
// Captions
// =============================================================================

/** "S1" is the interviewer, "S2" the subject; empty for no-narration lines */
export type SpeakerId = 'S1' | 'S2' | ''

/** A single caption line */
export interface CueText {
  speaker: SpeakerId
  words: TimedText[]
}

/** A displayable caption unit */
export interface CaptionCue {
  lines: CueText[]
}

/** Counts of problems found by the caption validation pass */
export interface CaptionValidation {
  durationTooShort: number
  durationTooLong: number
  lineCountTooFew: number
  lineCountTooMany: number
  lineTextMissing: number
  lineLengthTooLong: number
  total: number
}

export interface TextCaptions {
  cues: CaptionCue[]
  /** Transcript the cue offsets refer to */
  transcript: string
  validation: CaptionValidation
}

/** Transcript offset to media time pair */
export interface TSyncPair {
  offset: number
  time: number
}

// =============================================================================
// Named entities
// =============================================================================

export type EntityType =
  | 'Unset'
  | 'Person'
  | 'Loc'
  | 'Org'
  | 'Year'
  | 'YearPerhaps'
  | 'SomethingToIgnore'
  | 'SomethingElse'

/** Confidence levels; resolution bumps are cumulative */
export const EntityConfidence = {
  None: 0,
  Some: 1,
  Good: 2,
  Better: 3,
} as const

export interface NamedEntity {
  /** Mention text as extracted */
  text: string
  /** Mention plus surrounding transcriber annotation */
  contextualizedText: string
  startOffset: number
  length: number
  type: EntityType
  /** Entity label reported by a secondary extraction tool, when one was run */
  sourceHint?: string
  /** Whether both extraction tools reported this mention */
  receivedDualCoverage?: boolean
  confidence: number
}

/** United States ISO 3166 numeric country code */
export const US_COUNTRY_CODE = 840

export interface LocationEntity extends NamedEntity {
  /** Zero when unresolved */
  countryCode: number
  /** USGS numeric state code, zero when unresolved */
  stateCode: number
  /** USGS place ID (or the state's own ID for state-only matches), zero when unresolved */
  placeId: number
  count: number
}

export interface OrganizationalEntity extends NamedEntity {
  /** Library of Congress name authority ID, empty when unresolved */
  authorityId: string
  count: number
}

export interface Resolution<T> {
  resolved: T[]
  unresolved: T[]
}
