import { Test } from '@nestjs/testing';
import { InvalidArgumentError } from '../../common/errors';
import { RetrieverService } from '../retrieval/services/retriever.service';
import { SearchResult } from '../retrieval/types';
import { EvaluationService } from './evaluation.service';

function result(documentId: string, sequenceIndex = 0): SearchResult {
    return {
        chunkId: `${documentId}#${String(sequenceIndex).padStart(6, '0')}`,
        score: 1,
        text: `text of ${documentId}`,
        documentId,
        sequenceIndex,
        startOffset: 0,
        endOffset: 10,
        document: {},
    };
}

describe('EvaluationService', () => {
    const rankings: Record<string, SearchResult[]> = {
        transformers: [result('p1'), result('p1', 1), result('p2')],
        proteins: [result('p3'), result('p4')],
    };
    let search: jest.Mock<Promise<SearchResult[]>, [string, number]>;
    let service: EvaluationService;

    beforeEach(async () => {
        search = jest.fn(async (query: string, k: number) => (rankings[query] ?? []).slice(0, k));
        const moduleRef = await Test.createTestingModule({
            providers: [EvaluationService, { provide: RetrieverService, useValue: { search } }],
        }).compile();
        service = moduleRef.get(EvaluationService);
    });

    it('searches each query once at the largest k and reports mean metrics', async () => {
        const report = await service.evaluate(
            [
                { query: 'transformers', relevantDocumentIds: ['p2'] },
                { query: 'proteins', relevantDocumentIds: ['p4', 'p5'] },
            ],
            [1, 3],
        );

        expect(search.mock.calls).toEqual([
            ['transformers', 3],
            ['proteins', 3],
        ]);
        expect(report).toEqual({
            numQueries: 2,
            kValues: [1, 3],
            metrics: {
                'recall@1': 0,
                'precision@1': 0,
                'recall@3': 0.75,
                'precision@3': 0.5,
            },
            runs: [
                { query: 'transformers', retrieved: ['p1', 'p1', 'p2'] },
                { query: 'proteins', retrieved: ['p3', 'p4'] },
            ],
        });
    });

    it('uses the default k values', async () => {
        const report = await service.evaluate([{ query: 'proteins', relevantDocumentIds: ['p3'] }]);

        expect(report.kValues).toEqual([1, 3, 5, 10]);
        expect(search).toHaveBeenCalledWith('proteins', 10);
        expect(report.metrics['recall@1']).toBe(1);
    });

    it('rejects an empty query set or a bad k', async () => {
        await expect(service.evaluate([])).rejects.toThrow(InvalidArgumentError);
        await expect(service.evaluate([{ query: 'proteins', relevantDocumentIds: [] }], [0])).rejects.toThrow(
            'k values must be positive integers, got [0]',
        );
        expect(search).not.toHaveBeenCalled();
    });

    it('propagates retrieval failures', async () => {
        search.mockRejectedValueOnce(new InvalidArgumentError('Query must not be empty'));

        await expect(service.evaluate([{ query: ' ', relevantDocumentIds: ['p1'] }])).rejects.toThrow('Query must not be empty');
    });
});
