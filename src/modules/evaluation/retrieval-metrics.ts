/**
 * Retrieval quality metrics over document ids
 */

export interface RetrievalRun {
    query: string;
    /** document ids in rank order; repeats allowed */
    retrieved: string[];
    relevant: ReadonlySet<string>;
}

export type MetricsByK = Record<string, number>;

function intersectionSize(retrieved: ReadonlySet<string>, relevant: ReadonlySet<string>): number {
    let count = 0;
    for (const id of retrieved) {
        if (relevant.has(id)) {
            count++;
        }
    }
    return count;
}

/**
 * Share of the relevant documents found in the first `k` retrieved
 */
export function recallAtK(retrieved: string[], relevant: ReadonlySet<string>, k: number): number {
    if (relevant.size === 0) {
        return 0;
    }
    return intersectionSize(new Set(retrieved.slice(0, k)), relevant) / relevant.size;
}

/**
 * Share of the distinct documents in the first `k` retrieved that are relevant
 */
export function precisionAtK(retrieved: string[], relevant: ReadonlySet<string>, k: number): number {
    const atK = new Set(retrieved.slice(0, k));
    if (atK.size === 0) {
        return 0;
    }
    return intersectionSize(atK, relevant) / atK.size;
}

/**
 * Mean recall@k and precision@k across runs, keyed `recall@<k>` / `precision@<k>`
 */
export function evaluateRetrieval(runs: RetrievalRun[], kValues: number[]): MetricsByK {
    const metrics: MetricsByK = {};
    for (const k of kValues) {
        const recall = runs.map((run) => recallAtK(run.retrieved, run.relevant, k));
        const precision = runs.map((run) => precisionAtK(run.retrieved, run.relevant, k));
        metrics[`recall@${k}`] = mean(recall);
        metrics[`precision@${k}`] = mean(precision);
    }
    return metrics;
}

function mean(values: number[]): number {
    return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}
