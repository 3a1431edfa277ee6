import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import retrievalConfig from '../../../config/retrieval.config';
import { EmbeddingError, getErrorMessage, RetrievalError } from '../../../common/errors';
import { batchArray } from '../../vector-index/vector-index.utils';
import { EmbeddingModelProvider } from '../models/embedding-model.provider';
import { Chunk, EmbeddedChunk } from '../types';

/**
 * Embedder Service - batched, order-preserving text embedding.
 *
 * Empty or whitespace-only texts are rejected with EmbeddingError; nothing is
 * sent to the model when any input is empty. Text the model maps to the zero
 * vector (no word characters, for the hashing model) is rejected as well.
 */
@Injectable()
export class EmbedderService {
    private readonly logger = new Logger(EmbedderService.name);

    constructor(
        @Inject(retrievalConfig.KEY) private readonly config: ConfigType<typeof retrievalConfig>,
        private readonly models: EmbeddingModelProvider,
    ) { }

    get modelId(): string {
        return this.models.modelId;
    }

    async getDimension(): Promise<number> {
        return (await this.models.get()).dimension;
    }

    /**
     * Generate embeddings for multiple texts
     */
    async embed(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }
        texts.forEach((text, position) => {
            if (text.trim().length === 0) {
                throw new EmbeddingError(`Cannot embed empty text (position ${position})`);
            }
        });

        const model = await this.models.get();
        const batches = batchArray(texts, this.config.embeddingBatchSize);
        this.logger.debug(`🔄 Embedding ${texts.length} texts in ${batches.length} batches`);

        const vectors: number[][] = [];
        for (const [batchNumber, batch] of batches.entries()) {
            let output: number[][];
            try {
                output = await model.embedBatch(batch);
            } catch (error) {
                if (error instanceof RetrievalError) {
                    throw error;
                }
                throw new EmbeddingError(`Embedding batch ${batchNumber} failed: ${getErrorMessage(error)}`, error);
            }

            if (output.length !== batch.length) {
                throw new EmbeddingError(`Model returned ${output.length} vectors for ${batch.length} texts`);
            }
            for (const [i, vector] of output.entries()) {
                if (vector.length !== model.dimension) {
                    throw new EmbeddingError(`Model returned a ${vector.length}-dimensional vector, expected ${model.dimension}`);
                }
                if (!vector.every((value) => Number.isFinite(value))) {
                    throw new EmbeddingError('Model returned a non-finite vector component');
                }
                if (vector.every((value) => value === 0)) {
                    const position = batchNumber * this.config.embeddingBatchSize + i;
                    throw new EmbeddingError(`Text at position ${position} has no embeddable content`);
                }
            }
            vectors.push(...output);
        }

        this.logger.debug(`✅ Generated ${vectors.length} embeddings`);
        return vectors;
    }

    /**
     * Generate embedding for a query
     */
    async embedQuery(text: string): Promise<number[]> {
        const [vector] = await this.embed([text]);
        return vector;
    }

    async embedChunks(chunks: Chunk[]): Promise<EmbeddedChunk[]> {
        const vectors = await this.embed(chunks.map((chunk) => chunk.text));
        return chunks.map((chunk, i) => ({
            ...chunk,
            vector: vectors[i],
            modelId: this.modelId,
        }));
    }
}
