import { z } from 'zod'

/**
 * Schema for alignment formatting configuration.
 */
export const AlignmentConfigSchema = z.object({
  /**
   * Maximum number of consecutive unaligned words tolerated at the end of a transcript.
   * Longer trailing runs are dropped and the transcript is truncated before them (default: 10)
   */
  maxUnalignedTrailingWordsAllowed: z.number().int().min(0).default(10),
})

/**
 * Configuration for alignment formatting.
 */
export type AlignmentConfig = z.infer<typeof AlignmentConfigSchema>

/**
 * Schema for caption generation configuration.
 * Lengths are in characters, durations in milliseconds.
 */
export const CaptioningConfigSchema = z.object({
  /**
   * Threshold for the (integer) ratio of characters spoken in even vs odd paragraphs.
   * Below it the interviewer (S1) is assumed to speak first (default: 1)
   */
  speaker1ToSpeaker2CharRatio: z.number().default(1),
  /** Maximum characters in a caption line (default: 84) */
  maxCueLength: z.number().int().positive().default(84),
  /** Characters after which a long paragraph line is closed (default: 64) */
  targetLength: z.number().int().positive().default(64),
  /** Minimum cue duration (default: 1500) */
  minCueDuration: z.number().int().min(0).default(1500),
  /** Maximum cue duration (default: 7000) */
  maxCueDuration: z.number().int().positive().default(7000),
  /** Duration after which a long paragraph line is closed (default: 4500) */
  targetDuration: z.number().int().positive().default(4500),
  /** Maximum number of lines in a single cue (default: 2) */
  maxCueLineCount: z.number().int().positive().default(2),
  /** Generate WebVTT captions (default: true) */
  generateVtt: z.boolean().default(true),
  /** Generate the transcript sync table (default: true) */
  generateTSync: z.boolean().default(true),
  /** Generate a plain text diagnostic dump of the cues (default: true) */
  generateDiagnostic: z.boolean().default(true),
  /** NOTE block written after the WEBVTT header (default: "Oral history captioner") */
  vttNote: z.string().default('Oral history captioner'),
})

/**
 * Configuration for caption generation.
 */
export type CaptioningConfig = z.infer<typeof CaptioningConfigSchema>

/**
 * Schema for named entity resolution configuration.
 * File names are resolved against `dataPath`.
 */
export const EntityResolutionConfigSchema = z.object({
  /** Directory holding the reference tables, relative to the handler unless absolute (default: "data") */
  dataPath: z.string().default('data'),
  /** USGS places table: place ID, name, state ID */
  placesFile: z.string().default('USGS_Places_Table.txt'),
  /** City to default state hints: name, state alpha, state ID, place ID */
  cityHintsFile: z.string().default('DefaultStatesForSomeLocations.txt'),
  /** Corporate name authority: name, authority ID */
  corporateNamesFile: z.string().default('CorporateNameLookup.txt'),
  /** Corporate name synonyms: synonym, canonical name, authority ID */
  corporateSynonymsFile: z.string().default('AlternateCorporateNames.txt'),
})

/**
 * Configuration for named entity resolution.
 */
export type EntityResolutionConfig = z.infer<
  typeof EntityResolutionConfigSchema
>

/**
 * Schema for blob storage configuration.
 */
export const StorageConfigSchema = z.object({
  /** Skip uploads whose content checksum matches the stored object (default: true) */
  skipUnchanged: z.boolean().default(true),
})

export type StorageConfig = z.infer<typeof StorageConfigSchema>

/** Default values for AlignmentConfig */
const alignmentDefaults: AlignmentConfig = {
  maxUnalignedTrailingWordsAllowed: 10,
}

/** Default values for CaptioningConfig */
const captioningDefaults: CaptioningConfig = {
  speaker1ToSpeaker2CharRatio: 1,
  maxCueLength: 84,
  targetLength: 64,
  minCueDuration: 1500,
  maxCueDuration: 7000,
  targetDuration: 4500,
  maxCueLineCount: 2,
  generateVtt: true,
  generateTSync: true,
  generateDiagnostic: true,
  vttNote: 'Oral history captioner',
}

/** Default values for EntityResolutionConfig */
const entityResolutionDefaults: EntityResolutionConfig = {
  dataPath: 'data',
  placesFile: 'USGS_Places_Table.txt',
  cityHintsFile: 'DefaultStatesForSomeLocations.txt',
  corporateNamesFile: 'CorporateNameLookup.txt',
  corporateSynonymsFile: 'AlternateCorporateNames.txt',
}

/** Default values for StorageConfig */
const storageDefaults: StorageConfig = {
  skipUnchanged: true,
}

/**
 * Schema for the whole pipeline configuration.
 */
export const PipelineConfigSchema = z.object({
  /** Repair and interpolation of forced alignment output */
  alignment: AlignmentConfigSchema.optional().transform((val) => ({
    ...alignmentDefaults,
    ...val,
  })),

  /** Caption cue segmentation, coalescing and export */
  captioning: CaptioningConfigSchema.optional().transform((val) => ({
    ...captioningDefaults,
    ...val,
  })),

  /** Location and organization resolution reference data */
  entityResolution: EntityResolutionConfigSchema.optional().transform(
    (val) => ({
      ...entityResolutionDefaults,
      ...val,
    }),
  ),

  /** Output uploads */
  storage: StorageConfigSchema.optional().transform((val) => ({
    ...storageDefaults,
    ...val,
  })),
})

/**
 * Configuration for the pipeline.
 */
export type PipelineConfigProcessed = z.infer<typeof PipelineConfigSchema>
export type PipelineConfig = z.input<typeof PipelineConfigSchema>

/**
 * Allows to easily define a PipelineConfig object with proper typing (even with just JavaScript).
 * @param {PipelineConfig} config - The pipeline configuration object
 * @returns {PipelineConfig}
 */
export function defineConfig(config: PipelineConfig): PipelineConfig {
  return config
}
