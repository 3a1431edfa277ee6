import { z } from 'zod';
import { InvalidArgumentError } from '../../../common/errors';
import { readJsonLines, writeJsonLines } from '../../../common/utils/jsonl.util';
import { Chunk } from '../types';
import { documentMetadataSchema } from './metadata.schema';

/**
 * One line of the chunk corpus: the hand-off between chunking and embedding
 */
export const chunkRecordSchema = z
    .object({
        chunk_id: z.string().min(1),
        document_id: z.string().min(1),
        sequence_index: z.number().int().nonnegative(),
        start_offset: z.number().int().nonnegative(),
        end_offset: z.number().int().nonnegative(),
        text: z.string(),
        document: documentMetadataSchema.optional(),
    })
    .refine((record) => record.end_offset >= record.start_offset, {
        message: 'end_offset must not precede start_offset',
        path: ['end_offset'],
    });

export type ChunkRecord = z.infer<typeof chunkRecordSchema>;

export function toChunkRecord(chunk: Chunk): ChunkRecord {
    return {
        chunk_id: chunk.chunkId,
        document_id: chunk.documentId,
        sequence_index: chunk.sequenceIndex,
        start_offset: chunk.startOffset,
        end_offset: chunk.endOffset,
        text: chunk.text,
        ...(chunk.document ? { document: chunk.document } : {}),
    };
}

export function fromChunkRecord(record: ChunkRecord): Chunk {
    return {
        chunkId: record.chunk_id,
        documentId: record.document_id,
        sequenceIndex: record.sequence_index,
        startOffset: record.start_offset,
        endOffset: record.end_offset,
        text: record.text,
        ...(record.document ? { document: record.document } : {}),
    };
}

async function* toRecords(chunks: AsyncIterable<Chunk> | Iterable<Chunk>): AsyncGenerator<ChunkRecord> {
    for await (const chunk of chunks) {
        yield toChunkRecord(chunk);
    }
}

export function writeChunkCorpus(
    filePath: string,
    chunks: AsyncIterable<Chunk> | Iterable<Chunk>,
): Promise<number> {
    return writeJsonLines(filePath, toRecords(chunks));
}

export async function* readChunkCorpus(filePath: string): AsyncGenerator<Chunk> {
    for await (const { lineNumber, value } of readJsonLines(filePath)) {
        const result = chunkRecordSchema.safeParse(value);
        if (!result.success) {
            const issue = result.error.issues[0];
            throw new InvalidArgumentError(
                `${filePath}:${lineNumber}: invalid chunk record (${issue.path.join('.') || 'record'}: ${issue.message})`,
            );
        }
        yield fromChunkRecord(result.data);
    }
}
