import { z } from 'zod';

export const envSchema = z.object({
  // Application
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Kafka (document ingestion is disabled when no broker is set)
  KAFKA_BROKER: z.string().optional(),
  KAFKA_CLIENT_ID: z.string().default('paper-retrieval'),
  KAFKA_CONSUMER_GROUP_ID: z.string().default('paper-retrieval-indexer'),

  // OpenAI embeddings (only read by openai/* embedding models)
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),

  // Retrieval options are validated by retrieval.config.ts
  RETRIEVAL_CONFIG_FILE: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;
