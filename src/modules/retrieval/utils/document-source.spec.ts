import { writeFile } from 'fs/promises';
import { join } from 'path';
import { InvalidArgumentError } from '../../../common/errors';
import { collect, createTempDir, removeTempDir } from '../../../testing/fixtures';
import { parseDocument, readDocuments } from './document-source';

describe('document source', () => {
    it('accepts the paper-metadata shape', () => {
        expect(
            parseDocument({
                arxiv_id: '2006.11239',
                abstract: 'We present high quality image synthesis results.',
                title: 'Denoising Diffusion Probabilistic Models',
                authors: ['A. Author'],
                categories: ['cs.LG', 'stat.ML'],
                published: '2020-06-19',
            }),
        ).toEqual({
            id: '2006.11239',
            text: 'We present high quality image synthesis results.',
            metadata: {
                title: 'Denoising Diffusion Probabilistic Models',
                authors: ['A. Author'],
                categories: ['cs.LG', 'stat.ML'],
                published: '2020-06-19',
            },
        });
    });

    it('accepts the Document shape with nested metadata', () => {
        const document = parseDocument({ id: 'doc-1', text: 'body', metadata: { title: 'Nested' } });

        expect(document.id).toBe('doc-1');
        expect(document.text).toBe('body');
        expect(document.metadata.title).toBe('Nested');
    });

    it('requires an id', () => {
        expect(() => parseDocument({ text: 'orphan' }, 'line 3')).toThrow(InvalidArgumentError);
        expect(() => parseDocument({ text: 'orphan' }, 'line 3')).toThrow('line 3: invalid document');
    });

    it('reads a JSONL file lazily', async () => {
        const dir = await createTempDir();
        try {
            const filePath = join(dir, 'metadata.jsonl');
            await writeFile(filePath, `${JSON.stringify({ id: 'a', text: 'first' })}\n${JSON.stringify({ arxiv_id: 'b', abstract: 'second' })}\n`);

            const documents = await collect(readDocuments(filePath));

            expect(documents.map((document) => [document.id, document.text])).toEqual([
                ['a', 'first'],
                ['b', 'second'],
            ]);
        } finally {
            await removeTempDir(dir);
        }
    });
});
