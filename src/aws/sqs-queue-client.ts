import {
  DeleteMessageCommand,
  ReceiveMessageCommand,
  SendMessageBatchCommand,
  SendMessageCommand,
  type SQSClient
} from '@aws-sdk/client-sqs';
import type { BatchSendResult, QueueClient, QueueEntry, ReceivedMessage } from '../queue/queue-client.js';

export class SqsQueueClient implements QueueClient {
  constructor(private readonly client: SQSClient) {}

  async sendMessage(queueUrl: string, body: string): Promise<void> {
    await this.client.send(new SendMessageCommand({ QueueUrl: queueUrl, MessageBody: body }));
  }

  async sendMessageBatch(queueUrl: string, entries: QueueEntry[]): Promise<BatchSendResult> {
    const output = await this.client.send(
      new SendMessageBatchCommand({
        QueueUrl: queueUrl,
        Entries: entries.map((entry) => ({ Id: entry.id, MessageBody: entry.body }))
      })
    );

    return {
      successful: (output.Successful ?? []).map((entry) => entry.Id ?? '').filter((id) => id.length > 0),
      failed: (output.Failed ?? []).map((entry) => ({
        id: entry.Id ?? '',
        code: entry.Code ?? 'Unknown',
        message: entry.Message ?? '',
        senderFault: entry.SenderFault ?? false
      }))
    };
  }

  async receiveMessages(queueUrl: string, maxMessages: number, waitSeconds: number): Promise<ReceivedMessage[]> {
    const output = await this.client.send(
      new ReceiveMessageCommand({
        QueueUrl: queueUrl,
        MaxNumberOfMessages: maxMessages,
        WaitTimeSeconds: waitSeconds
      })
    );

    return (output.Messages ?? []).flatMap((message) =>
      message.MessageId && message.ReceiptHandle && message.Body !== undefined
        ? [{ messageId: message.MessageId, receiptHandle: message.ReceiptHandle, body: message.Body }]
        : []
    );
  }

  async deleteMessage(queueUrl: string, receiptHandle: string): Promise<void> {
    await this.client.send(new DeleteMessageCommand({ QueueUrl: queueUrl, ReceiptHandle: receiptHandle }));
  }
}
