import { registerAs } from '@nestjs/config';

/** Subscribed through `@EventPattern`, which takes a constant */
export const DOCUMENT_INGESTION_TOPIC = 'document-ingestion-events';

export default registerAs('kafka', () => ({
  broker: process.env.KAFKA_BROKER,
  clientId: process.env.KAFKA_CLIENT_ID || 'paper-retrieval',
  consumerGroupId: process.env.KAFKA_CONSUMER_GROUP_ID || 'paper-retrieval-indexer',
}));
