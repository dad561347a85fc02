import { S3Client, GetObjectCommand, PutObjectCommand } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { config } from './config.js';

export const s3Client = new S3Client({ region: config.region });

/**
 * Store a text artifact under `key`.
 */
export async function putObject(bucket: string, key: string, body: string, contentType: string): Promise<void> {
  await s3Client.send(
    new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: body,
      ContentType: contentType,
      CacheControl: 'no-store',
    })
  );
}

/**
 * Signed GET link that makes the browser save the object under `filename`.
 */
export async function getPresignedDownloadUrl(
  bucket: string,
  key: string,
  filename: string,
  expiresIn = config.api.presignedUrlExpirySeconds
): Promise<string> {
  const command = new GetObjectCommand({
    Bucket: bucket,
    Key: key,
    ResponseContentDisposition: `attachment; filename="${filename}"`,
  });
  return getSignedUrl(s3Client, command, { expiresIn });
}
