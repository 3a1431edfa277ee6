import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import retrievalConfig, { ChunkUnit } from '../../../config/retrieval.config';
import { InvalidConfigurationError } from '../../../common/errors';
import { Chunk, ChunkingOptions, Document } from '../types';

interface UnitSpan {
    start: number;
    end: number;
}

const TOKEN_PATTERN = /\S+/g;

/**
 * Chunk ids sort in sequence order within a document
 */
export function createChunkId(documentId: string, sequenceIndex: number): string {
    return `${documentId}#${String(sequenceIndex).padStart(6, '0')}`;
}

/**
 * NFC, LF line endings, trimmed. Chunk offsets refer to this form of the text.
 */
export function normalizeText(text: string): string {
    return text.normalize('NFC').replace(/\r\n?/g, '\n').trim();
}

function tokenSpans(text: string): UnitSpan[] {
    return Array.from(text.matchAll(TOKEN_PATTERN), (match) => {
        const start = match.index ?? 0;
        return { start, end: start + match[0].length };
    });
}

export function validateChunkingOptions(windowSize: number, overlap: number): void {
    if (!Number.isInteger(windowSize) || windowSize <= 0) {
        throw new InvalidConfigurationError(`window_size must be a positive integer, got ${windowSize}`);
    }
    if (!Number.isInteger(overlap) || overlap < 0) {
        throw new InvalidConfigurationError(`overlap must be a non-negative integer, got ${overlap}`);
    }
    if (overlap >= windowSize) {
        throw new InvalidConfigurationError(`overlap (${overlap}) must be smaller than window_size (${windowSize})`);
    }
}

/**
 * Sliding-window chunker with stable boundaries and ids
 */
@Injectable()
export class ChunkerService {
    private readonly logger = new Logger(ChunkerService.name);

    constructor(
        @Inject(retrievalConfig.KEY) private readonly config: ConfigType<typeof retrievalConfig>,
    ) { }

    /**
     * Split a document into windows of `windowSize` units that overlap by `overlap` units
     */
    chunk(
        document: Document,
        windowSize: number = this.config.windowSize,
        overlap: number = this.config.overlap,
        unit: ChunkUnit = this.config.chunkUnit,
    ): Chunk[] {
        validateChunkingOptions(windowSize, overlap);

        const text = document.text;
        const spans = unit === 'tokens' ? tokenSpans(text) : undefined;
        const unitCount = spans ? spans.length : text.length;
        const step = windowSize - overlap;
        const chunks: Chunk[] = [];

        for (let cursor = 0; cursor < unitCount; cursor += step) {
            const windowEnd = Math.min(cursor + windowSize, unitCount);
            const startOffset = spans ? spans[cursor].start : cursor;
            const endOffset = spans ? spans[windowEnd - 1].end : windowEnd;
            const sequenceIndex = chunks.length;

            chunks.push({
                chunkId: createChunkId(document.id, sequenceIndex),
                documentId: document.id,
                text: text.slice(startOffset, endOffset),
                startOffset,
                endOffset,
                sequenceIndex,
                document: document.metadata,
            });

            if (windowEnd === unitCount) {
                break;
            }
        }

        this.logger.debug(
            `📄 Document ${document.id}: ${chunks.length} chunks (${unitCount} ${unit}, window=${windowSize}, overlap=${overlap})`,
        );
        return chunks;
    }

    /**
     * Normalize and chunk a lazy sequence of documents
     */
    async *chunkDocuments(
        documents: AsyncIterable<Document> | Iterable<Document>,
        options?: ChunkingOptions,
    ): AsyncGenerator<Chunk> {
        const windowSize = options?.windowSize ?? this.config.windowSize;
        const overlap = options?.overlap ?? this.config.overlap;
        const unit = options?.unit ?? this.config.chunkUnit;
        validateChunkingOptions(windowSize, overlap);

        let documentCount = 0;
        let chunkCount = 0;
        for await (const document of documents) {
            const text = normalizeText(document.text);
            if (text.length === 0) {
                this.logger.warn(`⚠️ Skipping document ${document.id}: empty text`);
                continue;
            }

            for (const chunk of this.chunk({ ...document, text }, windowSize, overlap, unit)) {
                chunkCount++;
                yield chunk;
            }
            documentCount++;
        }

        this.logger.log(`✅ Created ${chunkCount} chunks from ${documentCount} documents`);
    }
}
