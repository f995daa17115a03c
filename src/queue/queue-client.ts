export interface QueueEntry {
  id: string;
  body: string;
}

export interface FailedEntry {
  id: string;
  code: string;
  message: string;
  senderFault: boolean;
}

export interface BatchSendResult {
  successful: string[];
  failed: FailedEntry[];
}

export interface ReceivedMessage {
  messageId: string;
  receiptHandle: string;
  body: string;
}

export interface QueueClient {
  sendMessage(queueUrl: string, body: string): Promise<void>;
  sendMessageBatch(queueUrl: string, entries: QueueEntry[]): Promise<BatchSendResult>;
  receiveMessages(queueUrl: string, maxMessages: number, waitSeconds: number): Promise<ReceivedMessage[]>;
  deleteMessage(queueUrl: string, receiptHandle: string): Promise<void>;
}

export const MAX_ENTRIES_PER_CALL = 10;
export const MAX_ENTRY_ID_LENGTH = 80;
