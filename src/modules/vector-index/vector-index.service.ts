import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import retrievalConfig from '../../config/retrieval.config';
import {
    DimensionMismatchError,
    EmptyBatchError,
    IndexUnavailableError,
    InvalidArgumentError,
    InvalidConfigurationError,
} from '../../common/errors';
import { EmbeddedChunk } from '../retrieval/types';
import {
    AddResult,
    IndexHandle,
    IndexOptions,
    IndexState,
    IndexStats,
    ScoredChunk,
    SearchOptions,
    SidecarRecord,
} from './types/vector-index.types';
import { VectorArena } from './vector-arena';
import { assignRows, listSearchOrder, trainIvf } from './ivf';
import { loadIndex, saveIndex } from './vector-index.store';
import {
    compareScored,
    prepareVector,
    similarity,
    validateEmbeddingDim,
    validateEmbeddingValues,
} from './vector-index.utils';

function toSidecarRecord(chunk: EmbeddedChunk): SidecarRecord {
    return {
        chunkId: chunk.chunkId,
        documentId: chunk.documentId,
        text: chunk.text,
        sequenceIndex: chunk.sequenceIndex,
        startOffset: chunk.startOffset,
        endOffset: chunk.endOffset,
        ...(chunk.document ? { document: chunk.document } : {}),
    };
}

/**
 * In-process vector index: exact (flat) or IVF_FLAT search over embedded chunks.
 *
 * Handles map to immutable snapshots. `build` and `add` validate everything
 * before producing a new snapshot, and swap it in with a single assignment,
 * so a failed call leaves the previous state untouched and concurrent
 * searches always see a consistent index.
 */
@Injectable()
export class VectorIndexService {
    private readonly logger = new Logger(VectorIndexService.name);
    private readonly indexes = new Map<string, IndexState>();
    private readonly pendingSaves = new Map<string, Promise<void>>();
    private nextHandle = 1;

    constructor(
        @Inject(retrievalConfig.KEY) private readonly config: ConfigType<typeof retrievalConfig>,
    ) { }

    private resolveOptions(overrides?: Partial<IndexOptions>): IndexOptions {
        const options: IndexOptions = {
            metric: overrides?.metric ?? this.config.distanceMetric,
            indexType: overrides?.indexType ?? this.config.indexType,
            nlist: overrides?.nlist ?? this.config.ivfNlist,
            nprobe: overrides?.nprobe ?? this.config.ivfNprobe,
            seed: overrides?.seed ?? this.config.indexSeed,
            duplicatePolicy: overrides?.duplicatePolicy ?? this.config.duplicatePolicy,
        };
        if (!Number.isInteger(options.nlist) || options.nlist <= 0 || !Number.isInteger(options.nprobe) || options.nprobe <= 0) {
            throw new InvalidConfigurationError(`nlist and nprobe must be positive integers`);
        }
        return options;
    }

    private register(state: IndexState): IndexHandle {
        const handle = new IndexHandle(`index-${this.nextHandle++}`);
        this.indexes.set(handle.id, state);
        return handle;
    }

    private getState(handle: IndexHandle): IndexState {
        const state = this.indexes.get(handle.id);
        if (!state) {
            throw new IndexUnavailableError(`Unknown or released index handle: ${handle.id}`);
        }
        return state;
    }

    /**
     * Validate a batch against a model id and dimension; returns prepared rows
     */
    private prepareBatch(
        chunks: EmbeddedChunk[],
        modelId: string,
        dimension: number,
        options: IndexOptions,
    ): Float64Array[] {
        const seen = new Set<string>();
        return chunks.map((chunk) => {
            if (chunk.modelId !== modelId) {
                throw new DimensionMismatchError(
                    `Chunk ${chunk.chunkId} was embedded with ${chunk.modelId}, index uses ${modelId}`,
                );
            }
            validateEmbeddingDim(chunk.vector, dimension, `Chunk ${chunk.chunkId}`);
            validateEmbeddingValues(chunk.vector, `Chunk ${chunk.chunkId}`);
            if (seen.has(chunk.chunkId)) {
                throw new InvalidArgumentError(`Duplicate chunk id in batch: ${chunk.chunkId}`);
            }
            seen.add(chunk.chunkId);
            return prepareVector(chunk.vector, options.metric);
        });
    }

    private withRows(state: IndexState, chunks: EmbeddedChunk[], rows: Float64Array[]): IndexState {
        const firstRow = state.arena.size;
        const arena = state.arena.append(rows);
        const records = [...state.records, ...chunks.map(toSidecarRecord)];
        const rowsById = new Map(state.rowsById);
        chunks.forEach((chunk, i) => rowsById.set(chunk.chunkId, firstRow + i));

        let ivf = state.ivf;
        if (state.options.indexType === 'ivf_flat') {
            ivf = ivf
                ? assignRows(ivf, arena, firstRow, state.options.metric)
                : trainIvf(arena, state.options.nlist, state.options.metric, state.options.seed);
        }

        return { ...state, arena, records, rowsById, ivf };
    }

    /**
     * Construct a fresh index from a non-empty batch
     */
    build(chunks: EmbeddedChunk[], overrides?: Partial<IndexOptions>): IndexHandle {
        if (chunks.length === 0) {
            throw new EmptyBatchError();
        }
        const options = this.resolveOptions(overrides);
        const { modelId } = chunks[0];
        const dimension = chunks[0].vector.length;
        if (dimension === 0) {
            throw new DimensionMismatchError('Embeddings must have at least one dimension');
        }

        const rows = this.prepareBatch(chunks, modelId, dimension, options);
        const empty: IndexState = {
            modelId,
            dimension,
            options,
            arena: VectorArena.empty(dimension, chunks.length),
            records: [],
            rowsById: new Map(),
        };
        const handle = this.register(this.withRows(empty, chunks, rows));

        this.logger.log(
            `✅ Index ${handle.id} built with ${chunks.length} vectors (dim=${dimension}, metric=${options.metric}, type=${options.indexType})`,
        );
        return handle;
    }

    /**
     * Explicitly empty index, to be filled by `add`
     */
    createEmpty(params: { modelId: string; dimension: number }, overrides?: Partial<IndexOptions>): IndexHandle {
        if (!Number.isInteger(params.dimension) || params.dimension <= 0) {
            throw new InvalidArgumentError(`dimension must be a positive integer, got ${params.dimension}`);
        }
        const handle = this.register({
            modelId: params.modelId,
            dimension: params.dimension,
            options: this.resolveOptions(overrides),
            arena: VectorArena.empty(params.dimension),
            records: [],
            rowsById: new Map(),
        });
        this.logger.log(`📦 Empty index ${handle.id} created (dim=${params.dimension}, model=${params.modelId})`);
        return handle;
    }

    /**
     * Append chunks; all-or-nothing. Known ids follow the duplicate policy.
     */
    add(handle: IndexHandle, chunks: EmbeddedChunk[]): AddResult {
        const state = this.getState(handle);
        const rows = this.prepareBatch(chunks, state.modelId, state.dimension, state.options);

        const fresh: EmbeddedChunk[] = [];
        const freshRows: Float64Array[] = [];
        chunks.forEach((chunk, i) => {
            const existingRow = state.rowsById.get(chunk.chunkId);
            if (existingRow === undefined) {
                fresh.push(chunk);
                freshRows.push(rows[i]);
                return;
            }
            if (state.options.duplicatePolicy === 'error') {
                throw new InvalidArgumentError(`Chunk ${chunk.chunkId} is already indexed`);
            }
            if (state.records[existingRow].text !== chunk.text) {
                this.logger.warn(`⚠️ Chunk ${chunk.chunkId} is already indexed with different text; keeping the indexed version`);
            }
        });

        if (fresh.length > 0) {
            this.indexes.set(handle.id, this.withRows(state, fresh, freshRows));
        }

        const skipped = chunks.length - fresh.length;
        this.logger.log(`✅ Added ${fresh.length} vectors to ${handle.id}${skipped > 0 ? ` (${skipped} already present)` : ''}`);
        return { handle, added: fresh.length, skipped };
    }

    /**
     * Top-k chunks by similarity, best first; ties by ascending chunk id
     */
    search(handle: IndexHandle, queryVector: ArrayLike<number>, k: number, options?: SearchOptions): ScoredChunk[] {
        const state = this.getState(handle);
        if (!Number.isInteger(k) || k <= 0) {
            throw new InvalidArgumentError(`k must be a positive integer, got ${k}`);
        }
        if (options?.metric && options.metric !== state.options.metric) {
            throw new InvalidConfigurationError(
                `Index ${handle.id} uses ${state.options.metric}; cannot search with ${options.metric}`,
            );
        }
        validateEmbeddingDim(queryVector, state.dimension, 'Query vector');
        validateEmbeddingValues(queryVector, 'Query vector');

        if (state.records.length === 0) {
            return [];
        }

        const { metric } = state.options;
        const query = prepareVector(queryVector, metric);

        let candidates: Iterable<number>;
        if (state.ivf) {
            const lists = state.ivf.lists;
            candidates = listSearchOrder(state.ivf.centroids, query, metric, state.options.nprobe).flatMap((list) => lists[list]);
        } else {
            candidates = state.records.keys();
        }

        const scored: ScoredChunk[] = [];
        for (const row of candidates) {
            scored.push({
                chunkId: state.records[row].chunkId,
                score: similarity(metric, query, state.arena.row(row)),
            });
        }
        return scored.sort(compareScored).slice(0, k);
    }

    has(handle: IndexHandle, chunkId: string): boolean {
        return this.getState(handle).rowsById.has(chunkId);
    }

    getRecord(handle: IndexHandle, chunkId: string): SidecarRecord | undefined {
        const state = this.getState(handle);
        const row = state.rowsById.get(chunkId);
        return row === undefined ? undefined : state.records[row];
    }

    stats(handle: IndexHandle): IndexStats {
        const state = this.getState(handle);
        return {
            handle: handle.id,
            size: state.records.length,
            dimension: state.dimension,
            modelId: state.modelId,
            metric: state.options.metric,
            indexType: state.options.indexType,
            ...(state.options.indexType === 'ivf_flat'
                ? { nlist: state.ivf?.centroids.length ?? state.options.nlist, nprobe: state.options.nprobe }
                : {}),
        };
    }

    /**
     * Persist the snapshot current at call time. Saves to one location run one at a time.
     */
    async save(handle: IndexHandle, location: string = this.config.indexLocation): Promise<void> {
        const state = this.getState(handle);
        const previous = this.pendingSaves.get(location) ?? Promise.resolve();
        // A failed earlier save was reported to its own caller
        const current = previous
            .catch(() => undefined)
            .then(() => saveIndex(state, location));
        this.pendingSaves.set(location, current);

        try {
            await current;
            this.logger.log(`💾 Index ${handle.id} saved to ${location} (${state.records.length} vectors)`);
        } finally {
            if (this.pendingSaves.get(location) === current) {
                this.pendingSaves.delete(location);
            }
        }
    }

    /**
     * Load a saved index into a new handle
     */
    async load(location: string = this.config.indexLocation, overrides?: Partial<IndexOptions>): Promise<IndexHandle> {
        const persisted = await loadIndex(location);
        const expectedMetric = overrides?.metric ?? this.config.distanceMetric;
        if (persisted.options.metric !== expectedMetric) {
            throw new InvalidConfigurationError(
                `Index at ${location} was built with ${persisted.options.metric}, configured metric is ${expectedMetric}`,
            );
        }

        const handle = this.register({
            ...persisted,
            options: {
                ...persisted.options,
                duplicatePolicy: overrides?.duplicatePolicy ?? this.config.duplicatePolicy,
            },
        });
        this.logger.log(`📂 Index loaded from ${location} as ${handle.id}: ${persisted.records.length} vectors`);
        return handle;
    }

    release(handle: IndexHandle): void {
        this.indexes.delete(handle.id);
    }
}
