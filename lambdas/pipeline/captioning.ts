import { S3Client } from '@aws-sdk/client-s3'
import { MetricUnit } from '@aws-lambda-powertools/metrics'
import { z } from 'zod'
import { loadPipelineConfig } from './lib/config'
import envs from './lib/envs'
import { logger, metrics, middify } from './lib/lambda-common'
import { getS3JSON, putS3Object } from './lib/s3'
import { captionText } from './steps/text-captioner'
import { AlignmentResultSchema, type CaptionValidation } from './types'
import { selectAlignment } from './utils/alignment-analysis'
import {
  generateDiagnostic,
  generateTSync,
  generateVtt,
} from './utils/captions'
import type { PipelineFailure } from './utils/result'

export const CaptioningEventSchema = z.object({
  /** Key of the default aligner pass */
  alignmentKey: z.string().min(1),
  /** Key of an optional conservative aligner pass to choose from */
  conservativeAlignmentKey: z.string().min(1).optional(),
  /** Clip duration in milliseconds */
  durationMs: z.number().int().positive(),
  /** Output keys are this prefix plus a per-format suffix */
  outputPrefix: z.string().min(1),
})

export type CaptioningEvent = z.infer<typeof CaptioningEventSchema>

export type CaptioningOutcome =
  | {
      status: 'completed'
      /** Which aligner pass was captioned */
      selected: 'first' | 'second'
      keys: string[]
      /** Keys whose stored content was already up to date */
      skipped: string[]
      validation: CaptionValidation
    }
  | {
      status: 'failed'
      reason: PipelineFailure
    }

interface CaptionOutput {
  key: string
  body: string
  contentType: string
}

const s3Client = new S3Client({})

const pipelineConfig = loadPipelineConfig()

/**
 * Caption one clip: pick the better aligner pass, segment it into cues and
 * store the enabled caption formats next to each other.
 */
export const handleEvent = middify(
  async (input: CaptioningEvent): Promise<CaptioningOutcome> => {
    const event = CaptioningEventSchema.parse(input)
    const { BUCKET_NAME } = envs
    const { captioning, storage } = pipelineConfig

    logger.info('Fetching alignment results', { event })
    const [first, second] = await Promise.all([
      getS3JSON(s3Client, BUCKET_NAME, event.alignmentKey, AlignmentResultSchema),
      event.conservativeAlignmentKey
        ? getS3JSON(
            s3Client,
            BUCKET_NAME,
            event.conservativeAlignmentKey,
            AlignmentResultSchema,
          )
        : Promise.resolve(undefined),
    ])

    const { selected, result } = selectAlignment(first, second)
    const captions = captionText(result, event.durationMs, pipelineConfig)

    if (!captions.ok) {
      logger.error('Unable to caption clip', {
        alignmentKey: event.alignmentKey,
        error: captions.error,
      })
      metrics.addMetric('CaptioningFailures', MetricUnit.Count, 1)
      return { status: 'failed', reason: captions.error }
    }

    const { cues, transcript, validation } = captions.value
    const outputs: CaptionOutput[] = []

    if (captioning.generateVtt) {
      outputs.push({
        key: `${event.outputPrefix}.vtt`,
        body: generateVtt({ cues, note: captioning.vttNote }),
        contentType: 'text/vtt',
      })
    }
    if (captioning.generateTSync) {
      outputs.push({
        key: `${event.outputPrefix}.tsync.json`,
        body: JSON.stringify(
          generateTSync(cues, transcript.length, event.durationMs),
        ),
        contentType: 'application/json',
      })
    }
    if (captioning.generateDiagnostic) {
      outputs.push({
        key: `${event.outputPrefix}.diagnostic.txt`,
        body: generateDiagnostic(cues),
        contentType: 'text/plain',
      })
    }

    const outcomes = await Promise.all(
      outputs.map(({ key, body, contentType }) =>
        putS3Object(s3Client, BUCKET_NAME, key, body, contentType, storage),
      ),
    )

    metrics.addMetric('CaptionCues', MetricUnit.Count, cues.length)
    metrics.addMetric(
      'CaptionValidationProblems',
      MetricUnit.Count,
      validation.total,
    )

    const keys = outputs.map(({ key }) => key)
    const skipped = keys.filter((_, i) => outcomes[i] === 'skipped')
    metrics.addMetric('SkippedWrites', MetricUnit.Count, skipped.length)

    logger.info('Captions stored', {
      cues: cues.length,
      keys,
      skipped,
      validation,
    })

    return { status: 'completed', selected, keys, skipped, validation }
  },
)
