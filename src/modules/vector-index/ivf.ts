import { DistanceMetric } from '../../config/retrieval.config';
import { IvfState } from './types/vector-index.types';
import { VectorArena } from './vector-arena';
import { vectorIndexConfig } from './vector-index.config';
import { createSeededRandom, normalizeEmbedding, similarity } from './vector-index.utils';

/**
 * Inverted-file (IVF_FLAT) partitioning: seeded k-means over the stored rows,
 * then exact scoring inside the selected lists.
 */

/**
 * Index of the best-scoring centroid; ties go to the lower index
 */
export function nearestCentroid(centroids: Float64Array[], vector: Float64Array, metric: DistanceMetric): number {
    let best = 0;
    let bestScore = -Infinity;
    centroids.forEach((centroid, index) => {
        const score = similarity(metric, vector, centroid);
        if (score > bestScore) {
            best = index;
            bestScore = score;
        }
    });
    return best;
}

/**
 * Centroid indexes to visit for a query, best first
 */
export function listSearchOrder(centroids: Float64Array[], query: Float64Array, metric: DistanceMetric, nprobe: number): number[] {
    return centroids
        .map((centroid, index) => ({ index, score: similarity(metric, query, centroid) }))
        .sort((a, b) => (a.score !== b.score ? b.score - a.score : a.index - b.index))
        .slice(0, nprobe)
        .map((entry) => entry.index);
}

function recomputeCentroids(
    arena: VectorArena,
    assignments: Int32Array,
    previous: Float64Array[],
    metric: DistanceMetric,
): Float64Array[] {
    const sums = previous.map(() => new Float64Array(arena.dimension));
    const counts = new Array<number>(previous.length).fill(0);

    for (let row = 0; row < arena.size; row++) {
        const cluster = assignments[row];
        const vector = arena.row(row);
        const sum = sums[cluster];
        for (let i = 0; i < vector.length; i++) {
            sum[i] += vector[i];
        }
        counts[cluster]++;
    }

    return sums.map((sum, cluster) => {
        if (counts[cluster] === 0) {
            return previous[cluster];
        }
        for (let i = 0; i < sum.length; i++) {
            sum[i] /= counts[cluster];
        }
        if (metric !== 'cosine') {
            return sum;
        }
        const unit = normalizeEmbedding(sum);
        return unit.some((value) => value !== 0) ? unit : previous[cluster];
    });
}

/**
 * Deterministic for a given arena, metric, nlist and seed
 */
export function trainIvf(
    arena: VectorArena,
    nlist: number,
    metric: DistanceMetric,
    seed: number,
    maxIterations: number = vectorIndexConfig.ivf.maxIterations,
): IvfState {
    const rowCount = arena.size;
    const clusterCount = Math.min(nlist, rowCount);
    const random = createSeededRandom(seed);

    // Partial Fisher-Yates: the first clusterCount entries are the seed rows
    const order = Array.from({ length: rowCount }, (_, i) => i);
    for (let i = 0; i < clusterCount; i++) {
        const j = i + Math.floor(random() * (rowCount - i));
        [order[i], order[j]] = [order[j], order[i]];
    }

    let centroids: Float64Array[] = order.slice(0, clusterCount).map((row) => Float64Array.from(arena.row(row)));
    const assignments = new Int32Array(rowCount).fill(-1);

    for (let iteration = 0; ; iteration++) {
        let changed = false;
        for (let row = 0; row < rowCount; row++) {
            const cluster = nearestCentroid(centroids, arena.row(row), metric);
            if (assignments[row] !== cluster) {
                assignments[row] = cluster;
                changed = true;
            }
        }

        // Assignments always match the final centroids
        if (!changed || iteration >= maxIterations) {
            break;
        }
        centroids = recomputeCentroids(arena, assignments, centroids, metric);
    }

    const lists = centroids.map((): number[] => []);
    assignments.forEach((cluster, row) => lists[cluster].push(row));
    return { centroids, lists };
}

/**
 * New rows join their nearest list; centroids are not retrained
 */
export function assignRows(state: IvfState, arena: VectorArena, firstRow: number, metric: DistanceMetric): IvfState {
    const lists = state.lists.map((list) => list.slice());
    for (let row = firstRow; row < arena.size; row++) {
        lists[nearestCentroid(state.centroids, arena.row(row), metric)].push(row);
    }
    return { centroids: state.centroids, lists };
}
