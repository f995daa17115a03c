import { LambdaClient } from '@aws-sdk/client-lambda';
import { S3Client } from '@aws-sdk/client-s3';
import { SQSClient } from '@aws-sdk/client-sqs';

/**
 * AWS SDK clients created on first use and kept for the life of the process, so a
 * warm Lambda container reuses its connections.
 */
export class AwsClients {
  private s3?: S3Client;
  private sqs?: SQSClient;
  private lambda?: LambdaClient;

  constructor(private readonly region?: string) {}

  get s3Client(): S3Client {
    this.s3 ??= new S3Client(this.clientConfig());
    return this.s3;
  }

  get sqsClient(): SQSClient {
    this.sqs ??= new SQSClient(this.clientConfig());
    return this.sqs;
  }

  get lambdaClient(): LambdaClient {
    this.lambda ??= new LambdaClient(this.clientConfig());
    return this.lambda;
  }

  private clientConfig(): { region?: string } {
    return this.region ? { region: this.region } : {};
  }
}
