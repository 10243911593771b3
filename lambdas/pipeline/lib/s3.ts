import { createHash } from 'node:crypto'
import {
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  type S3Client,
} from '@aws-sdk/client-s3'
import type { z } from 'zod'
import { logger } from './lambda-common'

/** Object metadata key holding the base64 MD5 of the stored body */
export const CHECKSUM_METADATA_KEY = 'content-md5'

export type PutOutcome = 'skipped' | 'written'

export interface PutOptions {
  /** Leave the object alone when its stored checksum matches the new body */
  skipUnchanged: boolean
}

/**
 * Retrieve an object from S3 as text
 *
 * @param s3Client An AWS SDK v3 S3 Client
 * @param bucket The S3 bucket name
 * @param key The S3 object key
 */
export async function getS3Text(
  s3Client: S3Client,
  bucket: string,
  key: string,
): Promise<string> {
  logger.info('Getting object', { bucket, key })
  const response = await s3Client.send(
    new GetObjectCommand({
      Bucket: bucket,
      Key: key,
    }),
  )

  const bodyStr = await response.Body?.transformToString()
  if (!bodyStr) {
    throw new Error('Empty response body from S3')
  }
  return bodyStr
}

/**
 * Retrieve JSON from S3 and validate it against a schema
 *
 * @param s3Client An AWS SDK v3 S3 Client
 * @param bucket The S3 bucket name
 * @param key The S3 object key
 * @param schema Schema the parsed JSON must satisfy
 * @returns The validated object
 */
export async function getS3JSON<S extends z.ZodType>(
  s3Client: S3Client,
  bucket: string,
  key: string,
  schema: S,
): Promise<z.infer<S>> {
  const bodyStr = await getS3Text(s3Client, bucket, key)
  return schema.parse(JSON.parse(bodyStr))
}

async function getStoredChecksum(
  s3Client: S3Client,
  bucket: string,
  key: string,
): Promise<string | undefined> {
  try {
    const head = await s3Client.send(
      new HeadObjectCommand({
        Bucket: bucket,
        Key: key,
      }),
    )
    return head.Metadata?.[CHECKSUM_METADATA_KEY]
  } catch (error: unknown) {
    if (error instanceof Error && error.name === 'NotFound') {
      return undefined
    }
    throw error
  }
}

/**
 * Store an object in S3, tagging it with the MD5 of its body. With
 * `skipUnchanged`, an object already holding the same body is not rewritten.
 *
 * @param s3Client An AWS SDK v3 S3 Client
 * @param bucket The S3 bucket name
 * @param key The S3 object key
 * @param body The object body
 * @param contentType MIME type of the body
 * @returns Whether the object was written or left as it was
 */
export async function putS3Object(
  s3Client: S3Client,
  bucket: string,
  key: string,
  body: string,
  contentType: string,
  { skipUnchanged }: PutOptions,
): Promise<PutOutcome> {
  const checksum = createHash('md5').update(body, 'utf-8').digest('base64')

  if (
    skipUnchanged &&
    (await getStoredChecksum(s3Client, bucket, key)) === checksum
  ) {
    logger.info('Skipping unchanged object', { bucket, key })
    return 'skipped'
  }

  logger.info('Putting object', { bucket, key })
  await s3Client.send(
    new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: body,
      ContentType: contentType,
      Metadata: { [CHECKSUM_METADATA_KEY]: checksum },
    }),
  )
  return 'written'
}
