import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';

export interface ObjectStore {
  getObject(bucket: string, key: string, signal?: AbortSignal): Promise<Buffer>;
  putObject(
    bucket: string,
    key: string,
    body: Buffer,
    contentType: string,
    signal?: AbortSignal
  ): Promise<void>;
}

export interface S3Location {
  bucket: string;
  key: string;
}

export function parseS3Url(url: string): S3Location {
  const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(url);
  if (!match) {
    throw new Error(`Invalid S3 URL: ${url}`);
  }
  return { bucket: match[1], key: match[2] };
}

export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;

  constructor(region?: string, client?: S3Client) {
    this.client = client ?? new S3Client(region ? { region } : {});
  }

  async getObject(bucket: string, key: string, signal?: AbortSignal): Promise<Buffer> {
    const response = await this.client.send(
      new GetObjectCommand({ Bucket: bucket, Key: key }),
      { abortSignal: signal }
    );
    if (!response.Body) {
      throw new Error(`Object not found: s3://${bucket}/${key}`);
    }
    return Buffer.from(await response.Body.transformToByteArray());
  }

  async putObject(
    bucket: string,
    key: string,
    body: Buffer,
    contentType: string,
    signal?: AbortSignal
  ): Promise<void> {
    await this.client.send(
      new PutObjectCommand({ Bucket: bucket, Key: key, Body: body, ContentType: contentType }),
      { abortSignal: signal }
    );
  }
}
