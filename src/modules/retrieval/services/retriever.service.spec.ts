import { join } from 'path';
import { TestingModule } from '@nestjs/testing';
import { DimensionMismatchError, IndexUnavailableError, InvalidArgumentError } from '../../../common/errors';
import { createRetrievalTestingModule, createTempDir, embeddedChunk, removeTempDir, testConfig } from '../../../testing/fixtures';
import { VectorIndexService } from '../../vector-index/vector-index.service';
import { Document } from '../types';
import { EmbedderService } from './embedder.service';
import { IndexingService } from './indexing.service';
import { RetrieverService } from './retriever.service';

const corpus: Document[] = [
    {
        id: 'alpha',
        text: 'neural retrieval neural retrieval neural retrieval',
        metadata: { title: 'Alpha', categories: ['cs.IR'], published: '2020-01-01' },
    },
    {
        id: 'beta',
        text: 'neural ranking',
        metadata: { title: 'Beta', categories: ['cs.LG', 'cs.IR'], published: '2022-05-01' },
    },
    {
        id: 'gamma',
        text: 'protein folding',
        metadata: { title: 'Gamma', categories: ['q-bio'], published: '2023-01-01' },
    },
];

describe('RetrieverService', () => {
    let dir: string;
    const modules: TestingModule[] = [];

    async function setup(overrides: Parameters<typeof testConfig>[0] = {}) {
        const moduleRef = await createRetrievalTestingModule(
            testConfig({
                window_size: 2,
                overlap: 0,
                chunk_unit: 'tokens',
                embedding_model_id: 'hashing/2048',
                index_location: join(dir, 'index'),
                ...overrides,
            }),
        );
        modules.push(moduleRef);
        return {
            retriever: moduleRef.get(RetrieverService),
            indexing: moduleRef.get(IndexingService),
            embedder: moduleRef.get(EmbedderService),
            vectorIndex: moduleRef.get(VectorIndexService),
        };
    }

    beforeEach(async () => {
        dir = await createTempDir();
    });

    afterEach(async () => {
        await Promise.all(modules.splice(0).map((moduleRef) => moduleRef.close()));
        await removeTempDir(dir);
    });

    it('finds the matching window of a tokenized document', async () => {
        const { retriever, indexing } = await setup({ window_size: 3, overlap: 1 });
        await indexing.indexDocuments([{ id: 'paper', text: 'A B C D E F', metadata: { title: 'Letters' } }]);

        const [top] = await retriever.search('C D E', 1);

        expect(top).toMatchObject({
            chunkId: 'paper#000001',
            text: 'C D E',
            documentId: 'paper',
            sequenceIndex: 1,
            startOffset: 4,
            endOffset: 9,
            document: { title: 'Letters' },
        });
        expect(top.score).toBeCloseTo(1, 10);
    });

    it('returns the best chunks first, ties by chunk id', async () => {
        const { retriever, indexing } = await setup();
        await indexing.indexDocuments(corpus);

        const results = await retriever.search('neural retrieval', 3);

        expect(results.map((result) => result.chunkId)).toEqual(['alpha#000000', 'alpha#000001', 'alpha#000002']);
    });

    it('keeps scores non-increasing and at most k results', async () => {
        const { retriever, indexing } = await setup();
        await indexing.indexDocuments(corpus);

        const results = await retriever.search('neural folding', 4);

        expect(results).toHaveLength(4);
        for (let i = 1; i < results.length; i++) {
            expect(results[i].score).toBeLessThanOrEqual(results[i - 1].score);
        }
    });

    it('caps the chunks returned per document', async () => {
        const { retriever, indexing } = await setup({ max_chunks_per_document_in_results: 1 });
        await indexing.indexDocuments(corpus);

        const results = await retriever.search('neural retrieval', 2);

        expect(results.map((result) => result.chunkId)).toEqual(['alpha#000000', 'beta#000000']);
    });

    it('widens the search until enough results survive the cap', async () => {
        const { retriever, indexing } = await setup({ max_chunks_per_document_in_results: 1, search_overfetch: 1 });
        await indexing.indexDocuments(corpus);

        const results = await retriever.search('neural retrieval', 3);

        expect(results.map((result) => result.documentId)).toEqual(['alpha', 'beta', 'gamma']);
    });

    describe('filters', () => {
        it('restricts to document ids', async () => {
            const { retriever, indexing } = await setup();
            await indexing.indexDocuments(corpus);

            const results = await retriever.search('neural retrieval', 5, { documentIds: ['beta', 'gamma'] });

            expect(results.map((result) => result.documentId)).toEqual(['beta', 'gamma']);
        });

        it('restricts to categories', async () => {
            const { retriever, indexing } = await setup();
            await indexing.indexDocuments(corpus);

            expect((await retriever.search('neural retrieval', 5, { categories: ['q-bio'] })).map((r) => r.chunkId)).toEqual([
                'gamma#000000',
            ]);
            expect(await retriever.search('neural retrieval', 5, { categories: ['math.ST'] })).toEqual([]);
        });

        it('restricts to a publication window', async () => {
            const { retriever, indexing } = await setup();
            await indexing.indexDocuments(corpus);

            const after = await retriever.search('neural retrieval', 5, { publishedAfter: '2021-01-01' });
            const before = await retriever.search('neural retrieval', 5, { publishedBefore: '2020-12-31' });

            expect(after.map((result) => result.documentId)).toEqual(['beta', 'gamma']);
            expect(before.map((result) => result.chunkId)).toEqual(['alpha#000000', 'alpha#000001', 'alpha#000002']);
        });

        it('rejects an unparseable date', async () => {
            const { retriever, indexing } = await setup();
            await indexing.indexDocuments(corpus);

            await expect(retriever.search('neural', 5, { publishedAfter: 'last spring' })).rejects.toThrow(InvalidArgumentError);
        });
    });

    it('rejects a bad k or an empty query', async () => {
        const { retriever } = await setup();

        await expect(retriever.search('neural', 0)).rejects.toThrow(InvalidArgumentError);
        await expect(retriever.search('neural', 2.5)).rejects.toThrow(InvalidArgumentError);
        await expect(retriever.search('   ', 3)).rejects.toThrow('Query must not be empty');
    });

    it('is unavailable until an index exists', async () => {
        const { retriever } = await setup();

        await expect(retriever.search('neural', 3)).rejects.toThrow(IndexUnavailableError);
        expect(retriever.activeHandle).toBeUndefined();
    });

    it('loads a saved index on first search', async () => {
        const writer = await setup();
        await writer.indexing.indexDocuments(corpus);
        const expected = await writer.retriever.search('neural ranking', 3);

        const reader = await setup();

        await expect(reader.retriever.search('neural ranking', 3)).resolves.toEqual(expected);
        expect(reader.retriever.activeHandle).toBeDefined();
    });

    it('picks up a newer index on reload', async () => {
        const writer = await setup();
        await writer.indexing.indexDocuments(corpus.slice(0, 1));
        const reader = await setup();
        await reader.retriever.ensureIndex();

        await writer.indexing.indexDocuments(corpus.slice(1));
        const before = await reader.retriever.searchWithContext('protein', 10);
        await reader.retriever.reload();
        const after = await reader.retriever.searchWithContext('protein', 10);

        expect(before.indexStats.totalChunks).toBe(3);
        expect(after.indexStats.totalChunks).toBe(5);
        expect(after.results[0].documentId).toBe('gamma');
    });

    it('refuses an index built by another model of the same dimension', async () => {
        const { retriever, vectorIndex } = await setup({ embedding_model_id: 'hashing/8' });
        const foreign = vectorIndex.build([embeddedChunk('d#000000', [1, 0, 0, 0, 0, 0, 0, 0], { modelId: 'openai/other-8' })]);
        await vectorIndex.save(foreign, join(dir, 'index'));

        await expect(retriever.search('neural', 1)).rejects.toThrow(DimensionMismatchError);
        retriever.useIndex(foreign);
        await expect(retriever.search('neural', 1)).rejects.toThrow(
            `Index ${foreign.id} holds openai/other-8 vectors; queries are embedded with hashing/8`,
        );
    });

    it('finishes a search while the served index is replaced', async () => {
        const { retriever, indexing, embedder } = await setup();
        await indexing.indexDocuments(corpus);
        const original = retriever.activeHandle;

        const embedQuery = embedder.embedQuery.bind(embedder);
        let resume: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            resume = resolve;
        });
        jest.spyOn(embedder, 'embedQuery').mockImplementation(async (text: string) => {
            await gate;
            return embedQuery(text);
        });

        const pending = retriever.search('protein folding', 1);
        await retriever.reload();
        resume();

        await expect(pending).resolves.toMatchObject([{ chunkId: 'gamma#000000' }]);
        expect(retriever.activeHandle?.id).not.toBe(original?.id);
    });

    it('reports the query and index statistics with the results', async () => {
        const { retriever, indexing } = await setup();
        await indexing.indexDocuments(corpus);

        const context = await retriever.searchWithContext('protein folding', 2);

        expect(context).toMatchObject({
            query: 'protein folding',
            numResults: 2,
            indexStats: { totalChunks: 5, model: 'hashing/2048', metric: 'cosine', indexType: 'flat' },
        });
        expect(context.results[0].chunkId).toBe('gamma#000000');
    });
});
