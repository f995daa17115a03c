import { Readable } from 'node:stream';
import {
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  NotFound,
  PutObjectCommand,
  S3ServiceException,
  type S3Client
} from '@aws-sdk/client-s3';
import type { ListPage, ObjectStore } from '../storage/object-store.js';

const isMissing = (error: unknown): boolean =>
  error instanceof NotFound || (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404);

export class S3ObjectStore implements ObjectStore {
  constructor(private readonly client: S3Client) {}

  async listKeys(bucket: string, prefix: string, continuationToken?: string | null): Promise<ListPage> {
    const output = await this.client.send(
      new ListObjectsV2Command({
        Bucket: bucket,
        Prefix: prefix,
        ContinuationToken: continuationToken ?? undefined
      })
    );

    return {
      keys: (output.Contents ?? []).map((item) => item.Key).filter((key): key is string => Boolean(key)),
      nextContinuationToken: output.IsTruncated ? output.NextContinuationToken ?? null : null
    };
  }

  async getObjectStream(bucket: string, key: string): Promise<Readable> {
    const output = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    if (!(output.Body instanceof Readable)) {
      throw new Error(`s3://${bucket}/${key} returned no readable body`);
    }

    return output.Body;
  }

  async headObject(bucket: string, key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: bucket, Key: key }));
      return true;
    } catch (error) {
      if (isMissing(error)) {
        return false;
      }
      throw error;
    }
  }

  async putObject(bucket: string, key: string, body: string, contentType: string): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: body,
        ContentType: contentType
      })
    );
  }
}
