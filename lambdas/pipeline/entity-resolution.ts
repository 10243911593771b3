import { S3Client } from '@aws-sdk/client-s3'
import { MetricUnit } from '@aws-lambda-powertools/metrics'
import { z } from 'zod'
import { loadPipelineConfig } from './lib/config'
import envs from './lib/envs'
import { logger, metrics, middify } from './lib/lambda-common'
import { getS3Text, putS3Object } from './lib/s3'
import { codeToAlpha, resolveLocations } from './steps/domestic-location-resolver'
import {
  type OrganizationConflict,
  resolveOrganizations,
} from './steps/organization-resolver'
import { polishStanfordNer } from './steps/stanford-ner-polisher'
import type { LocationEntity, OrganizationalEntity } from './types'
import {
  type LocationReferenceData,
  loadLocationReferenceData,
  loadOrganizationReferenceData,
  type OrganizationReferenceData,
} from './utils/reference-data'
import type { PipelineFailure } from './utils/result'

export const EntityResolutionEventSchema = z.object({
  /** Key of the story transcript the tagger was run on */
  transcriptKey: z.string().min(1),
  /** Key of the Stanford NER output, one `text<TAB>tag` token per line */
  nerKey: z.string().min(1),
  /** Key the entity document is written to */
  outputKey: z.string().min(1),
})

export type EntityResolutionEvent = z.infer<typeof EntityResolutionEventSchema>

export interface ResolvedLocation extends LocationEntity {
  /** Two-letter state code */
  stateAlpha: string
}

/** Stored result of resolving the entities of one story */
export interface EntityDocument {
  organizations: {
    resolved: OrganizationalEntity[]
    unresolved: OrganizationalEntity[]
    conflict?: OrganizationConflict
  }
  locations: {
    resolved: ResolvedLocation[]
    unresolved: LocationEntity[]
  }
}

export type EntityResolutionOutcome =
  | {
      status: 'completed'
      outputKey: string
      written: boolean
      organizations: number
      locations: number
      unresolved: number
    }
  | {
      status: 'failed'
      reason: PipelineFailure
    }

interface ReferenceData {
  locations: LocationReferenceData
  organizations: OrganizationReferenceData
}

const s3Client = new S3Client({})

const pipelineConfig = loadPipelineConfig()

// Loaded on first use and kept for the lifetime of the container
let referenceData: ReferenceData | undefined

function getReferenceData(): ReferenceData {
  if (!referenceData) {
    referenceData = {
      locations: loadLocationReferenceData(
        pipelineConfig.entityResolution,
        __dirname,
      ),
      organizations: loadOrganizationReferenceData(
        pipelineConfig.entityResolution,
        __dirname,
      ),
    }
  }
  return referenceData
}

/**
 * Resolve the organizations and U.S. locations named in one story and store
 * them as an entity document.
 */
export const handleEvent = middify(
  async (input: EntityResolutionEvent): Promise<EntityResolutionOutcome> => {
    const event = EntityResolutionEventSchema.parse(input)
    const { BUCKET_NAME } = envs

    logger.info('Fetching transcript and NER output', { event })
    const [transcript, tokenStream] = await Promise.all([
      getS3Text(s3Client, BUCKET_NAME, event.transcriptKey),
      getS3Text(s3Client, BUCKET_NAME, event.nerKey),
    ])

    const entities = polishStanfordNer(tokenStream, transcript)
    if (!entities.ok) {
      metrics.addMetric('EntityResolutionFailures', MetricUnit.Count, 1)
      return { status: 'failed', reason: entities.error }
    }

    const tables = getReferenceData()
    const organizations = resolveOrganizations(
      entities.value,
      tables.organizations,
    )
    const locations = resolveLocations(entities.value, tables.locations)
    const { states } = tables.locations

    const document: EntityDocument = {
      organizations,
      locations: {
        resolved: locations.resolved.map((location) => ({
          ...location,
          stateAlpha: codeToAlpha(location.stateCode, states),
        })),
        unresolved: locations.unresolved,
      },
    }

    const outcome = await putS3Object(
      s3Client,
      BUCKET_NAME,
      event.outputKey,
      JSON.stringify(document),
      'application/json',
      pipelineConfig.storage,
    )

    const unresolved =
      organizations.unresolved.length + locations.unresolved.length
    metrics.addMetric(
      'ResolvedOrganizations',
      MetricUnit.Count,
      organizations.resolved.length,
    )
    metrics.addMetric(
      'ResolvedLocations',
      MetricUnit.Count,
      locations.resolved.length,
    )
    metrics.addMetric('UnresolvedEntities', MetricUnit.Count, unresolved)
    if (outcome === 'skipped') {
      metrics.addMetric('SkippedWrites', MetricUnit.Count, 1)
    }
    if (organizations.conflict) {
      metrics.addMetric('OrganizationConflicts', MetricUnit.Count, 1)
    }

    return {
      status: 'completed',
      outputKey: event.outputKey,
      written: outcome === 'written',
      organizations: organizations.resolved.length,
      locations: locations.resolved.length,
      unresolved,
    }
  },
)
