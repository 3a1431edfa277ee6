import { createHashBytes } from '../../../common/utils/hash.util';
import { normalizeEmbedding } from '../../vector-index/vector-index.utils';
import { EmbeddingModel } from './types';

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;

/**
 * Feature-hashing embedder: each lowercase word adds ±1 to a bucket chosen by
 * its SHA-256 digest, then the vector is L2-normalized. Runs locally and gives
 * identical vectors across processes. Text without any word maps to the zero vector.
 */
export class HashingEmbeddingModel implements EmbeddingModel {
    readonly modelId: string;

    constructor(readonly dimension: number) {
        this.modelId = `hashing/${dimension}`;
    }

    embedText(text: string): number[] {
        const embedding = new Array<number>(this.dimension).fill(0);

        for (const word of text.toLowerCase().match(WORD_PATTERN) ?? []) {
            const digest = createHashBytes(word);
            const bucket = digest.readUInt32BE(0) % this.dimension;
            const sign = (digest[4] & 1) === 1 ? -1 : 1;
            embedding[bucket] += sign;
        }

        return Array.from(normalizeEmbedding(embedding));
    }

    async embedBatch(texts: string[]): Promise<number[][]> {
        return texts.map((text) => this.embedText(text));
    }
}
