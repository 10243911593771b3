import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import {
  type PipelineConfigProcessed,
  PipelineConfigSchema,
} from '@oral-history/config'

/**
 * Load the pipeline config from the layer (Lambda) or the local file (development)
 */
export function loadPipelineConfig(): PipelineConfigProcessed {
  const configPath = process.env.AWS_LAMBDA_FUNCTION_NAME
    ? '/opt/nodejs/config.json'
    : join(__dirname, '..', 'config.json')

  return PipelineConfigSchema.parse(
    JSON.parse(readFileSync(configPath, 'utf-8')),
  )
}
