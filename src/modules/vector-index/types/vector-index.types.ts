/**
 * Vector Index Types
 */
import { DistanceMetric, DuplicatePolicy, IndexType } from '../../../config/retrieval.config';
import { DocumentMetadata } from '../../retrieval/types';
import { VectorArena } from '../vector-arena';

/**
 * Opaque reference to an index owned by VectorIndexService
 */
export class IndexHandle {
    constructor(readonly id: string) { }

    toString(): string {
        return this.id;
    }
}

export interface IndexOptions {
    metric: DistanceMetric;
    indexType: IndexType;
    nlist: number;
    nprobe: number;
    seed: number;
    duplicatePolicy: DuplicatePolicy;
}

export interface SearchOptions {
    /** must equal the metric the index was built with */
    metric?: DistanceMetric;
}

/**
 * Sidecar entry stored for every row of the index
 */
export interface SidecarRecord {
    chunkId: string;
    documentId: string;
    text: string;
    sequenceIndex: number;
    startOffset: number;
    endOffset: number;
    document?: DocumentMetadata;
}

export interface ScoredChunk {
    chunkId: string;
    score: number;
}

export interface IvfState {
    centroids: Float64Array[];
    /** row offsets per centroid */
    lists: number[][];
}

export interface IndexStats {
    handle: string;
    size: number;
    dimension: number;
    modelId: string;
    metric: DistanceMetric;
    indexType: IndexType;
    nlist?: number;
    nprobe?: number;
}

export interface AddResult {
    handle: IndexHandle;
    added: number;
    skipped: number;
}

/**
 * Immutable snapshot behind a handle. `add` replaces it, never edits it.
 */
export interface IndexState {
    modelId: string;
    dimension: number;
    options: IndexOptions;
    arena: VectorArena;
    records: readonly SidecarRecord[];
    rowsById: ReadonlyMap<string, number>;
    /** absent until an ivf_flat index has rows to train on */
    ivf?: IvfState;
}
