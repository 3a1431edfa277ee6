import { z } from 'zod';
import { InvalidArgumentError } from '../../../common/errors';
import { readJsonLines } from '../../../common/utils/jsonl.util';
import { Document } from '../types';

/**
 * Accepts both the Document shape and the paper-metadata shape of the ingestion stage
 */
export const documentRecordSchema = z
    .object({
        id: z.string().min(1).optional(),
        arxiv_id: z.string().min(1).optional(),
        text: z.string().optional(),
        abstract: z.string().optional(),
        title: z.string().optional(),
        authors: z.array(z.string()).optional(),
        categories: z.array(z.string()).optional(),
        published: z.string().optional(),
        metadata: z
            .object({
                title: z.string().optional(),
                authors: z.array(z.string()).optional(),
                categories: z.array(z.string()).optional(),
                published: z.string().optional(),
            })
            .optional(),
    })
    .refine((record) => record.id !== undefined || record.arxiv_id !== undefined, {
        message: 'either id or arxiv_id is required',
        path: ['id'],
    })
    .transform(
        (record): Document => ({
            id: record.id ?? record.arxiv_id ?? '',
            text: record.text ?? record.abstract ?? '',
            metadata: {
                title: record.metadata?.title ?? record.title,
                authors: record.metadata?.authors ?? record.authors,
                categories: record.metadata?.categories ?? record.categories,
                published: record.metadata?.published ?? record.published,
            },
        }),
    );

export function parseDocument(value: unknown, source = 'document'): Document {
    const result = documentRecordSchema.safeParse(value);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new InvalidArgumentError(`${source}: invalid document (${issue.path.join('.') || 'record'}: ${issue.message})`);
    }
    return result.data;
}

/**
 * Lazily read upstream documents from a JSONL file
 */
export async function* readDocuments(filePath: string): AsyncGenerator<Document> {
    for await (const { lineNumber, value } of readJsonLines(filePath)) {
        yield parseDocument(value, `${filePath}:${lineNumber}`);
    }
}
