import { readFileSync } from 'fs';
import { registerAs } from '@nestjs/config';
import { z } from 'zod';
import { getErrorMessage, InvalidConfigurationError } from '../common/errors';

export const CHUNK_UNITS = ['characters', 'tokens'] as const;
export const DISTANCE_METRICS = ['cosine', 'euclidean'] as const;
export const INDEX_TYPES = ['flat', 'ivf_flat'] as const;
export const DUPLICATE_POLICIES = ['skip', 'error'] as const;

export type ChunkUnit = (typeof CHUNK_UNITS)[number];
export type DistanceMetric = (typeof DISTANCE_METRICS)[number];
export type IndexType = (typeof INDEX_TYPES)[number];
export type DuplicatePolicy = (typeof DUPLICATE_POLICIES)[number];

/** `hashing/<dimension>` or `openai/<model name>` */
export const EMBEDDING_MODEL_ID_PATTERN = /^(hashing\/[1-9]\d{0,4}|openai\/[\w.-]+)$/;

const optionShape = {
    window_size: z.coerce.number().int().positive(),
    overlap: z.coerce.number().int().nonnegative(),
    chunk_unit: z.enum(CHUNK_UNITS),
    embedding_model_id: z.string().regex(EMBEDDING_MODEL_ID_PATTERN, 'expected hashing/<dim> or openai/<model>'),
    embedding_batch_size: z.coerce.number().int().positive(),
    distance_metric: z.enum(DISTANCE_METRICS),
    index_type: z.enum(INDEX_TYPES),
    ivf_nlist: z.coerce.number().int().positive(),
    ivf_nprobe: z.coerce.number().int().positive(),
    index_seed: z.coerce.number().int().nonnegative(),
    duplicate_policy: z.enum(DUPLICATE_POLICIES),
    max_chunks_per_document_in_results: z.coerce.number().int().nonnegative(),
    search_overfetch: z.coerce.number().int().positive(),
    index_location: z.string().min(1),
    chunks_path: z.string().min(1),
    documents_path: z.string().min(1),
};

type RetrievalOptions = { [K in keyof typeof optionShape]: z.infer<(typeof optionShape)[K]> };
type OptionKey = keyof RetrievalOptions;

const partialOptionsSchema = z.object(optionShape).partial().strict();

const retrievalOptionsSchema = z
    .object(optionShape)
    .strict()
    .refine((options) => options.overlap < options.window_size, {
        message: 'overlap must be smaller than window_size',
        path: ['overlap'],
    })
    .transform((options) => ({
        windowSize: options.window_size,
        overlap: options.overlap,
        chunkUnit: options.chunk_unit,
        embeddingModelId: options.embedding_model_id,
        embeddingBatchSize: options.embedding_batch_size,
        distanceMetric: options.distance_metric,
        indexType: options.index_type,
        ivfNlist: options.ivf_nlist,
        ivfNprobe: options.ivf_nprobe,
        indexSeed: options.index_seed,
        duplicatePolicy: options.duplicate_policy,
        maxChunksPerDocumentInResults: options.max_chunks_per_document_in_results,
        searchOverfetch: options.search_overfetch,
        indexLocation: options.index_location,
        chunksPath: options.chunks_path,
        documentsPath: options.documents_path,
    }));

export type RetrievalConfig = z.output<typeof retrievalOptionsSchema>;

export const DEFAULT_RETRIEVAL_OPTIONS: RetrievalOptions = {
    window_size: 1200,
    overlap: 120,
    chunk_unit: 'characters',
    embedding_model_id: 'hashing/384',
    embedding_batch_size: 64,
    distance_metric: 'cosine',
    index_type: 'flat',
    ivf_nlist: 16,
    ivf_nprobe: 4,
    index_seed: 42,
    duplicate_policy: 'skip',
    max_chunks_per_document_in_results: 0,
    search_overfetch: 4,
    index_location: 'data/index',
    chunks_path: 'data/processed/chunks.jsonl',
    documents_path: 'data/raw/metadata.jsonl',
};

const ENV_VARIABLES: Record<OptionKey, string> = {
    window_size: 'CHUNK_WINDOW_SIZE',
    overlap: 'CHUNK_OVERLAP',
    chunk_unit: 'CHUNK_UNIT',
    embedding_model_id: 'EMBEDDING_MODEL_ID',
    embedding_batch_size: 'EMBEDDING_BATCH_SIZE',
    distance_metric: 'DISTANCE_METRIC',
    index_type: 'INDEX_TYPE',
    ivf_nlist: 'IVF_NLIST',
    ivf_nprobe: 'IVF_NPROBE',
    index_seed: 'INDEX_SEED',
    duplicate_policy: 'DUPLICATE_POLICY',
    max_chunks_per_document_in_results: 'MAX_CHUNKS_PER_DOCUMENT_IN_RESULTS',
    search_overfetch: 'SEARCH_OVERFETCH',
    index_location: 'INDEX_LOCATION',
    chunks_path: 'CHUNKS_PATH',
    documents_path: 'DOCUMENTS_PATH',
};

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

/**
 * Validate a complete option set (snake_case keys). Unknown keys are rejected.
 */
export function parseRetrievalConfig(input: unknown): RetrievalConfig {
    const result = retrievalOptionsSchema.safeParse(input);
    if (!result.success) {
        throw new InvalidConfigurationError(`Invalid retrieval configuration: ${formatIssues(result.error)}`);
    }
    return result.data;
}

function readConfigFile(path: string): Record<string, unknown> {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
        throw new InvalidConfigurationError(`Cannot read retrieval config file ${path}: ${getErrorMessage(error)}`, error);
    }

    const result = partialOptionsSchema.safeParse(raw);
    if (!result.success) {
        throw new InvalidConfigurationError(`Invalid retrieval config file ${path}: ${formatIssues(result.error)}`);
    }
    return result.data;
}

function readEnvironment(env: NodeJS.ProcessEnv): Record<string, string> {
    const options: Record<string, string> = {};
    for (const [key, variable] of Object.entries(ENV_VARIABLES)) {
        const value = env[variable];
        if (value !== undefined && value.trim() !== '') {
            options[key] = value.trim();
        }
    }
    return options;
}

/**
 * Resolve options from defaults, then RETRIEVAL_CONFIG_FILE, then environment variables.
 */
export function loadRetrievalConfig(env: NodeJS.ProcessEnv = process.env): RetrievalConfig {
    const fromFile = env.RETRIEVAL_CONFIG_FILE ? readConfigFile(env.RETRIEVAL_CONFIG_FILE) : {};
    return parseRetrievalConfig({
        ...DEFAULT_RETRIEVAL_OPTIONS,
        ...fromFile,
        ...readEnvironment(env),
    });
}

export default registerAs('retrieval', () => loadRetrievalConfig());
