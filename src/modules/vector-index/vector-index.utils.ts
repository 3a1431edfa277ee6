import { DistanceMetric } from '../../config/retrieval.config';
import { DimensionMismatchError, InvalidArgumentError } from '../../common/errors';
import { ScoredChunk } from './types/vector-index.types';

/**
 * Utility functions for vector index operations
 */

export type Vector = ArrayLike<number>;

/**
 * Validate embedding dimension
 */
export function validateEmbeddingDim(embedding: Vector, expectedDim: number, label = 'Embedding'): void {
    if (embedding.length !== expectedDim) {
        throw new DimensionMismatchError(
            `${label} dimension mismatch: expected ${expectedDim}, got ${embedding.length}`,
        );
    }
}

/**
 * Validate embedding values
 */
export function validateEmbeddingValues(embedding: Vector, label = 'Embedding'): void {
    for (let i = 0; i < embedding.length; i++) {
        if (!Number.isFinite(embedding[i])) {
            throw new InvalidArgumentError(`${label} has an invalid value at index ${i}: ${embedding[i]}`);
        }
    }
}

/**
 * Normalize embedding vector; a zero vector stays zero
 */
export function normalizeEmbedding(embedding: Vector): Float64Array {
    let sum = 0;
    for (let i = 0; i < embedding.length; i++) {
        sum += embedding[i] * embedding[i];
    }
    const norm = Math.sqrt(sum);

    const normalized = Float64Array.from(embedding);
    if (norm === 0) {
        return normalized;
    }
    for (let i = 0; i < normalized.length; i++) {
        normalized[i] /= norm;
    }
    return normalized;
}

export function dotProduct(a: Vector, b: Vector): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += a[i] * b[i];
    }
    return sum;
}

export function squaredEuclidean(a: Vector, b: Vector): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        const diff = a[i] - b[i];
        sum += diff * diff;
    }
    return sum;
}

/**
 * Calculate cosine similarity between two embeddings
 */
export function cosineSimilarity(a: Vector, b: Vector): number {
    if (a.length !== b.length) {
        throw new DimensionMismatchError('Embeddings must have the same dimension');
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;

    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    const denominator = Math.sqrt(normA) * Math.sqrt(normB);
    if (denominator === 0) {
        return 0;
    }
    return dot / denominator;
}

/**
 * Vector as stored for a metric: cosine indexes keep unit vectors
 */
export function prepareVector(embedding: Vector, metric: DistanceMetric): Float64Array {
    return metric === 'cosine' ? normalizeEmbedding(embedding) : Float64Array.from(embedding);
}

/**
 * Similarity of two prepared vectors; larger is better for every metric
 */
export function similarity(metric: DistanceMetric, query: Vector, stored: Vector): number {
    switch (metric) {
        case 'cosine':
            return dotProduct(query, stored);
        case 'euclidean':
            return -squaredEuclidean(query, stored);
    }
}

/**
 * Best score first, ties by ascending chunk id (code-unit order)
 */
export function compareScored(a: ScoredChunk, b: ScoredChunk): number {
    if (a.score !== b.score) {
        return b.score - a.score;
    }
    if (a.chunkId === b.chunkId) {
        return 0;
    }
    return a.chunkId < b.chunkId ? -1 : 1;
}

/**
 * Batch array into chunks
 */
export function batchArray<T>(array: T[], batchSize: number): T[][] {
    const batches: T[][] = [];

    for (let i = 0; i < array.length; i += batchSize) {
        batches.push(array.slice(i, i + batchSize));
    }

    return batches;
}

/**
 * Seeded PRNG (mulberry32) returning floats in [0, 1)
 */
export function createSeededRandom(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}
