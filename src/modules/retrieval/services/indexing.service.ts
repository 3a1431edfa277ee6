import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import retrievalConfig from '../../../config/retrieval.config';
import { IndexUnavailableError } from '../../../common/errors';
import { IndexHandle } from '../../vector-index/types/vector-index.types';
import { VectorIndexService } from '../../vector-index/vector-index.service';
import { Chunk, Document } from '../types';
import { readChunkCorpus, writeChunkCorpus } from '../utils/chunk-corpus';
import { readDocuments } from '../utils/document-source';
import { ChunkerService } from './chunker.service';
import { EmbedderService } from './embedder.service';
import { RetrieverService } from './retriever.service';

export interface ChunkCorpusResult {
    documentsPath: string;
    chunksPath: string;
    documents: number;
    chunks: number;
}

export interface BuildIndexResult {
    handle: string;
    location: string;
    chunks: number;
    dimension: number;
    modelId: string;
    durationMs: number;
}

export interface IndexDocumentsResult {
    handle: string;
    documents: number;
    chunks: number;
    added: number;
    skipped: number;
    size: number;
}

/**
 * Indexing Service - documents → chunk corpus → embeddings → saved index
 */
@Injectable()
export class IndexingService {
    private readonly logger = new Logger(IndexingService.name);
    private writes: Promise<unknown> = Promise.resolve();

    constructor(
        @Inject(retrievalConfig.KEY) private readonly config: ConfigType<typeof retrievalConfig>,
        private readonly chunker: ChunkerService,
        private readonly embedder: EmbedderService,
        private readonly vectorIndex: VectorIndexService,
        private readonly retriever: RetrieverService,
    ) { }

    /**
     * Run index mutations one at a time; a failed run does not block the next
     */
    private serialize<T>(task: () => Promise<T>): Promise<T> {
        const run = this.writes.then(task, task);
        this.writes = run.then(
            () => undefined,
            () => undefined,
        );
        return run;
    }

    private withoutBlankChunks(chunks: Chunk[]): Chunk[] {
        return chunks.filter((chunk) => {
            if (chunk.text.trim().length > 0) {
                return true;
            }
            this.logger.warn(`⚠️ Skipping whitespace-only chunk ${chunk.chunkId}`);
            return false;
        });
    }

    private attach(handle: IndexHandle): void {
        const previous = this.retriever.activeHandle;
        this.retriever.useIndex(handle);
        if (previous && previous.id !== handle.id) {
            this.vectorIndex.release(previous);
        }
    }

    /**
     * Documents JSONL → normalized, chunked → chunk corpus JSONL
     */
    async chunkCorpus(
        documentsPath: string = this.config.documentsPath,
        chunksPath: string = this.config.chunksPath,
    ): Promise<ChunkCorpusResult> {
        this.logger.log(`📚 Chunking documents from ${documentsPath}`);
        let documents = 0;
        async function* counted(): AsyncGenerator<Document> {
            for await (const document of readDocuments(documentsPath)) {
                documents++;
                yield document;
            }
        }

        const chunks = await writeChunkCorpus(chunksPath, this.chunker.chunkDocuments(counted()));
        this.logger.log(`💾 Wrote ${chunks} chunks from ${documents} documents to ${chunksPath}`);
        return { documentsPath, chunksPath, documents, chunks };
    }

    /**
     * Chunk corpus → embeddings → fresh index, saved and served by the retriever
     */
    buildIndex(
        chunksPath: string = this.config.chunksPath,
        location: string = this.config.indexLocation,
    ): Promise<BuildIndexResult> {
        return this.serialize(async () => {
            const startTime = Date.now();
            this.logger.log(`🏗️ Building index from ${chunksPath}`);

            const chunks: Chunk[] = [];
            for await (const chunk of readChunkCorpus(chunksPath)) {
                chunks.push(chunk);
            }

            const embedded = await this.embedder.embedChunks(this.withoutBlankChunks(chunks));
            const handle = this.vectorIndex.build(embedded);
            await this.vectorIndex.save(handle, location);
            this.attach(handle);

            const stats = this.vectorIndex.stats(handle);
            const durationMs = Date.now() - startTime;
            this.logger.log(`✅ Index built: ${stats.size} vectors in ${durationMs}ms`);
            return {
                handle: handle.id,
                location,
                chunks: stats.size,
                dimension: stats.dimension,
                modelId: stats.modelId,
                durationMs,
            };
        });
    }

    /**
     * Incremental path: chunk, embed and append documents to the served index
     */
    indexDocuments(documents: Document[]): Promise<IndexDocumentsResult> {
        return this.serialize(async () => {
            const chunks: Chunk[] = [];
            for await (const chunk of this.chunker.chunkDocuments(documents)) {
                chunks.push(chunk);
            }
            const embedded = await this.embedder.embedChunks(this.withoutBlankChunks(chunks));

            const handle = await this.currentOrEmptyIndex();
            const { added, skipped } = this.vectorIndex.add(handle, embedded);
            const size = this.vectorIndex.stats(handle).size;
            if (added > 0) {
                await this.vectorIndex.save(handle, this.config.indexLocation);
            }

            this.logger.log(`📥 Indexed ${documents.length} documents: ${added} chunks added, ${skipped} already present`);
            return { handle: handle.id, documents: documents.length, chunks: embedded.length, added, skipped, size };
        });
    }

    private async currentOrEmptyIndex(): Promise<IndexHandle> {
        try {
            const loaded = await this.retriever.ensureIndex();
            return this.retriever.activeHandle ?? loaded;
        } catch (error) {
            if (!(error instanceof IndexUnavailableError)) {
                throw error;
            }
        }

        const handle = this.vectorIndex.createEmpty({
            modelId: this.embedder.modelId,
            dimension: await this.embedder.getDimension(),
        });
        this.retriever.useIndex(handle);
        return handle;
    }
}
