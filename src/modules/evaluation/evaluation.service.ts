import { Injectable, Logger } from '@nestjs/common';
import { InvalidArgumentError } from '../../common/errors';
import { RetrieverService } from '../retrieval/services/retriever.service';
import { evaluateRetrieval, MetricsByK, RetrievalRun } from './retrieval-metrics';

export const DEFAULT_K_VALUES = [1, 3, 5, 10];

export interface EvaluationQuery {
    query: string;
    relevantDocumentIds: string[];
}

export interface EvaluationReport {
    numQueries: number;
    kValues: number[];
    metrics: MetricsByK;
    runs: Array<{ query: string; retrieved: string[] }>;
}

/**
 * Evaluation Service - recall/precision of the retriever against labelled queries
 */
@Injectable()
export class EvaluationService {
    private readonly logger = new Logger(EvaluationService.name);

    constructor(private readonly retriever: RetrieverService) { }

    async evaluate(queries: EvaluationQuery[], kValues: number[] = DEFAULT_K_VALUES): Promise<EvaluationReport> {
        if (queries.length === 0) {
            throw new InvalidArgumentError('At least one evaluation query is required');
        }
        if (kValues.length === 0 || kValues.some((k) => !Number.isInteger(k) || k <= 0)) {
            throw new InvalidArgumentError(`k values must be positive integers, got [${kValues.join(', ')}]`);
        }

        const maxK = Math.max(...kValues);
        this.logger.log(`📊 Evaluating ${queries.length} queries at k=${kValues.join(',')}`);

        const runs: RetrievalRun[] = [];
        for (const { query, relevantDocumentIds } of queries) {
            const results = await this.retriever.search(query, maxK);
            runs.push({
                query,
                retrieved: results.map((result) => result.documentId),
                relevant: new Set(relevantDocumentIds),
            });
        }

        const metrics = evaluateRetrieval(runs, kValues);
        this.logger.log(`✅ Evaluation complete: ${JSON.stringify(metrics)}`);
        return {
            numQueries: runs.length,
            kValues,
            metrics,
            runs: runs.map(({ query, retrieved }) => ({ query, retrieved })),
        };
    }
}
