export { QueueDefaults, type QueueClient, type QueueMessage, type ReceiveOptions, type SendOptions } from './port.js';
export {
  FileProcessingMessageSchema,
  parseFileProcessingMessage,
  serializeFileProcessingMessage,
  type FileProcessingMessage,
} from './messages/file-processing-message.js';
export { parseJsonMessage } from './messages/parse-json-message.js';
export { DEFAULT_SQS_RETRY_POLICY, SqsQueueClient, type SqsQueueClientOptions } from './adapters/sqs-queue-client.js';
export {
  InMemoryQueueClient,
  transientQueueError,
  type InMemoryQueueOptions,
} from './adapters/in-memory-queue-client.js';
