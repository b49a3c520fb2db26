import { GetObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";

export interface UploadUrlRequest {
  key: string;
  contentType: string;
  contentLength?: number;
  expiresInSeconds?: number;
}

/** Storage refs are opaque to the rest of the service; only this seam turns them into URLs. */
export interface PhotoStorage {
  /** With `contentLength` set, the signed request only accepts a body of exactly that size. */
  createUploadUrl(input: UploadUrlRequest): Promise<string>;
  createDownloadUrl(input: { key: string; expiresInSeconds?: number }): Promise<string>;
}

interface StorageConfig {
  bucket: string;
  region: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  forcePathStyle: boolean;
}

export function getStorageConfig(env: NodeJS.ProcessEnv = process.env): StorageConfig {
  const bucket = env.S3_BUCKET;

  if (!bucket) {
    throw new Error("S3_BUCKET is required");
  }

  return {
    bucket,
    region: env.S3_REGION ?? "us-east-1",
    endpoint: env.S3_ENDPOINT,
    accessKeyId: env.S3_ACCESS_KEY_ID,
    secretAccessKey: env.S3_SECRET_ACCESS_KEY,
    forcePathStyle: env.S3_FORCE_PATH_STYLE === "true"
  };
}

export class S3PhotoStorage implements PhotoStorage {
  private readonly client: S3Client;

  constructor(private readonly config: StorageConfig) {
    const { accessKeyId, secretAccessKey } = config;

    this.client = new S3Client({
      region: config.region,
      endpoint: config.endpoint,
      forcePathStyle: config.forcePathStyle,
      credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined
    });
  }

  async createUploadUrl(input: UploadUrlRequest) {
    const command = new PutObjectCommand({
      Bucket: this.config.bucket,
      Key: input.key,
      ContentType: input.contentType,
      ContentLength: input.contentLength
    });

    return getSignedUrl(this.client, command, { expiresIn: input.expiresInSeconds ?? 900 });
  }

  async createDownloadUrl(input: { key: string; expiresInSeconds?: number }) {
    const command = new GetObjectCommand({
      Bucket: this.config.bucket,
      Key: input.key
    });

    return getSignedUrl(this.client, command, { expiresIn: input.expiresInSeconds ?? 3600 });
  }
}
