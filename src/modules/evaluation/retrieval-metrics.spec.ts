import { evaluateRetrieval, precisionAtK, recallAtK } from './retrieval-metrics';

describe('retrieval metrics', () => {
    const relevant = new Set(['a', 'c']);
    const retrieved = ['a', 'b', 'a', 'c'];

    it('computes recall over the first k document ids', () => {
        expect(recallAtK(retrieved, relevant, 1)).toBe(0.5);
        expect(recallAtK(retrieved, relevant, 3)).toBe(0.5);
        expect(recallAtK(retrieved, relevant, 4)).toBe(1);
    });

    it('computes precision over the distinct documents in the first k', () => {
        expect(precisionAtK(retrieved, relevant, 1)).toBe(1);
        expect(precisionAtK(retrieved, relevant, 3)).toBe(0.5);
        expect(precisionAtK(retrieved, relevant, 4)).toBeCloseTo(2 / 3, 10);
    });

    it('scores zero when nothing is relevant or nothing was retrieved', () => {
        expect(recallAtK(retrieved, new Set(), 3)).toBe(0);
        expect(precisionAtK([], relevant, 3)).toBe(0);
    });

    it('averages each metric across runs', () => {
        const metrics = evaluateRetrieval(
            [
                { query: 'q1', retrieved: ['a', 'b'], relevant: new Set(['a']) },
                { query: 'q2', retrieved: ['c', 'd'], relevant: new Set(['d']) },
            ],
            [1, 2],
        );

        expect(metrics).toEqual({
            'recall@1': 0.5,
            'precision@1': 0.5,
            'recall@2': 1,
            'precision@2': 0.5,
        });
    });
});
