import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import retrievalConfig, {
    DEFAULT_RETRIEVAL_OPTIONS,
    parseRetrievalConfig,
    RetrievalConfig,
} from '../config/retrieval.config';
import { EmbeddingModelProvider } from '../modules/retrieval/models/embedding-model.provider';
import { ChunkerService } from '../modules/retrieval/services/chunker.service';
import { EmbedderService } from '../modules/retrieval/services/embedder.service';
import { IndexingService } from '../modules/retrieval/services/indexing.service';
import { RetrieverService } from '../modules/retrieval/services/retriever.service';
import { EmbeddedChunk } from '../modules/retrieval/types';
import { VectorIndexService } from '../modules/vector-index/vector-index.service';

export function testConfig(overrides: Partial<typeof DEFAULT_RETRIEVAL_OPTIONS> = {}): RetrievalConfig {
    return parseRetrievalConfig({ ...DEFAULT_RETRIEVAL_OPTIONS, ...overrides });
}

export function embeddedChunk(
    chunkId: string,
    vector: number[],
    overrides: Partial<EmbeddedChunk> = {},
): EmbeddedChunk {
    return {
        chunkId,
        documentId: chunkId.split('#')[0],
        text: `text of ${chunkId}`,
        startOffset: 0,
        endOffset: 10,
        sequenceIndex: 0,
        vector,
        modelId: 'test/model',
        ...overrides,
    };
}

export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
    const collected: T[] = [];
    for await (const item of items) {
        collected.push(item);
    }
    return collected;
}

export async function createTempDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), 'paper-retrieval-'));
}

export async function removeTempDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

/**
 * The retrieval providers wired against a fixed configuration
 */
export function createRetrievalTestingModule(config: RetrievalConfig): Promise<TestingModule> {
    return Test.createTestingModule({
        providers: [
            ChunkerService,
            EmbeddingModelProvider,
            EmbedderService,
            VectorIndexService,
            RetrieverService,
            IndexingService,
            { provide: retrievalConfig.KEY, useValue: config },
            { provide: ConfigService, useValue: new ConfigService({}) },
        ],
    }).compile();
}
