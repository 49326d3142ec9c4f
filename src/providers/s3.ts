// Import AWS SDK v3 modules
import { S3Client } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { logger } from '../utils/logger.js';

const log = logger.createContext('s3');

// Helper function to trim quotes from environment variables
const trimQuotes = (value: string | undefined): string | undefined => {
  return value ? value.replace(/^['"]|['"]$/g, '') : undefined;
};

let s3Client: S3Client | null = null;

/**
 * Client built from AWS_REGION / AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY on first use
 */
export function getS3Client(): S3Client {
  if (!s3Client) {
    const accessKeyId = trimQuotes(process.env.AWS_ACCESS_KEY_ID);
    const secretAccessKey = trimQuotes(process.env.AWS_SECRET_ACCESS_KEY);
    s3Client = new S3Client({
      region: trimQuotes(process.env.AWS_REGION),
      credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined
    });
  }
  return s3Client;
}

/**
 * Bucket named by CRAWL_S3_BUCKET, if set
 */
export function defaultBucket(): string | undefined {
  return trimQuotes(process.env.CRAWL_S3_BUCKET);
}

export function objectUrl(bucket: string, key: string): string {
  const region = trimQuotes(process.env.AWS_REGION) ?? 'us-east-1';
  return `https://${bucket}.s3.${region}.amazonaws.com/${key}`;
}

/**
 * Upload a body to an S3 bucket
 * @returns URL of the uploaded object
 */
export const uploadObject = async (
  bucket: string,
  key: string,
  body: string | Buffer,
  contentType: string
): Promise<string> => {
  try {
    const upload = new Upload({
      client: getS3Client(),
      params: {
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: contentType
      }
    });

    await upload.done();
    log.debug(`Uploaded s3://${bucket}/${key}`);
    return objectUrl(bucket, key);
  } catch (err) {
    log.error(`Error uploading s3://${bucket}/${key}`, err);
    throw err;
  }
};
