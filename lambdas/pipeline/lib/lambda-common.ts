import { Logger } from '@aws-lambda-powertools/logger'
import { injectLambdaContext } from '@aws-lambda-powertools/logger/middleware'
import { Metrics } from '@aws-lambda-powertools/metrics'
import { logMetrics } from '@aws-lambda-powertools/metrics/middleware'
import { Tracer } from '@aws-lambda-powertools/tracer'
import { captureLambdaHandler } from '@aws-lambda-powertools/tracer/middleware'
import middy from '@middy/core'
import type { Context } from 'aws-lambda'

const serviceName = process.env.POWERTOOLS_SERVICE_NAME ?? 'oral-history-pipeline'

// Exported powertools instances for use anywhere within a Lambda function implementation
export const logger = new Logger({ serviceName })
export const tracer = new Tracer({ serviceName })
export const metrics = new Metrics({
  namespace: process.env.POWERTOOLS_METRICS_NAMESPACE ?? 'OralHistory',
  serviceName,
})

/**
 * Create a wrapped Lambda Function handler with injected powertools logger, tracer and metrics
 *
 * @param handler The undecorated Lambda Function handler
 * @returns A 'middified' handler
 */
export const middify = <TEvent, TResult>(
  handler: (event: TEvent, context: Context) => Promise<TResult>,
) => {
  return middy(handler)
    .use(injectLambdaContext(logger, { logEvent: true }))
    .use(logMetrics(metrics))
    .use(captureLambdaHandler(tracer))
}
