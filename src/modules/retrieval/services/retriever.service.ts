import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import retrievalConfig from '../../../config/retrieval.config';
import { DimensionMismatchError, IndexUnavailableError, InvalidArgumentError } from '../../../common/errors';
import { IndexHandle, IndexStats, ScoredChunk, SidecarRecord } from '../../vector-index/types/vector-index.types';
import { VectorIndexService } from '../../vector-index/vector-index.service';
import { EmbedderService } from './embedder.service';
import { SearchContext, SearchFilters, SearchResult } from '../types';

interface DateBounds {
    after?: number;
    before?: number;
}

interface SearchRun {
    results: SearchResult[];
    stats: IndexStats;
}

function parseDateFilter(value: string | undefined, name: string): number | undefined {
    if (value === undefined) {
        return undefined;
    }
    const time = Date.parse(value);
    if (Number.isNaN(time)) {
        throw new InvalidArgumentError(`${name} is not a valid date: ${value}`);
    }
    return time;
}

function hasFilters(filters?: SearchFilters): boolean {
    return Boolean(
        filters?.documentIds?.length ||
        filters?.categories?.length ||
        filters?.publishedAfter ||
        filters?.publishedBefore,
    );
}

function matchesFilters(record: SidecarRecord, filters: SearchFilters | undefined, dates: DateBounds): boolean {
    if (filters?.documentIds?.length && !filters.documentIds.includes(record.documentId)) {
        return false;
    }
    if (filters?.categories?.length) {
        const categories = record.document?.categories ?? [];
        if (!categories.some((category) => filters.categories?.includes(category))) {
            return false;
        }
    }
    if (dates.after !== undefined || dates.before !== undefined) {
        const published = record.document?.published ? Date.parse(record.document.published) : NaN;
        if (Number.isNaN(published)) {
            return false;
        }
        if ((dates.after !== undefined && published < dates.after) || (dates.before !== undefined && published > dates.before)) {
            return false;
        }
    }
    return true;
}

/**
 * Retriever Service - query embedding, index search, per-document cap, filters
 */
@Injectable()
export class RetrieverService {
    private readonly logger = new Logger(RetrieverService.name);
    private handle?: IndexHandle;
    private loading?: Promise<IndexHandle>;

    constructor(
        @Inject(retrievalConfig.KEY) private readonly config: ConfigType<typeof retrievalConfig>,
        private readonly embedder: EmbedderService,
        private readonly vectorIndex: VectorIndexService,
    ) { }

    /**
     * Serve queries from an in-memory index
     */
    useIndex(handle: IndexHandle): void {
        this.handle = handle;
        this.logger.log(`🔗 Retriever now serving index ${handle.id}`);
    }

    get activeHandle(): IndexHandle | undefined {
        return this.handle;
    }

    /**
     * Attached index, or the one saved at the configured location
     */
    async ensureIndex(): Promise<IndexHandle> {
        if (this.handle) {
            return this.handle;
        }
        if (!this.loading) {
            this.loading = this.vectorIndex
                .load(this.config.indexLocation)
                .then((handle) => {
                    if (this.handle) {
                        // An index was attached while this one loaded
                        this.vectorIndex.release(handle);
                        return this.handle;
                    }
                    this.handle = handle;
                    return handle;
                })
                .finally(() => {
                    this.loading = undefined;
                });
        }
        return this.loading;
    }

    /**
     * Statistics of the index currently served
     */
    async indexStats(): Promise<IndexStats> {
        const loaded = await this.ensureIndex();
        return this.vectorIndex.stats(this.handle ?? loaded);
    }

    /**
     * Re-read the configured index location
     */
    async reload(): Promise<IndexHandle> {
        const handle = await this.vectorIndex.load(this.config.indexLocation);
        const previous = this.handle;
        this.handle = handle;
        if (previous) {
            this.vectorIndex.release(previous);
        }
        return handle;
    }

    /**
     * Search for relevant chunks
     */
    async search(query: string, k: number, filters?: SearchFilters): Promise<SearchResult[]> {
        const { results } = await this.run(query, k, filters);
        return results;
    }

    private async run(query: string, k: number, filters?: SearchFilters): Promise<SearchRun> {
        if (!Number.isInteger(k) || k <= 0) {
            throw new InvalidArgumentError(`k must be a positive integer, got ${k}`);
        }
        if (query.trim().length === 0) {
            throw new InvalidArgumentError('Query must not be empty');
        }
        const dates: DateBounds = {
            after: parseDateFilter(filters?.publishedAfter, 'publishedAfter'),
            before: parseDateFilter(filters?.publishedBefore, 'publishedBefore'),
        };

        const startTime = Date.now();
        const queryVector = await this.embedder.embedQuery(query);
        const loaded = await this.ensureIndex();

        // No await from here on: a rebuild or reload cannot release the handle mid-search
        const handle = this.handle ?? loaded;
        const stats = this.vectorIndex.stats(handle);
        if (stats.modelId !== this.embedder.modelId) {
            throw new DimensionMismatchError(
                `Index ${handle.id} holds ${stats.modelId} vectors; queries are embedded with ${this.embedder.modelId}`,
            );
        }
        if (stats.size === 0) {
            return { results: [], stats };
        }

        const perDocumentCap = this.config.maxChunksPerDocumentInResults;
        const narrowed = perDocumentCap > 0 || hasFilters(filters);

        let fetchK = Math.min(stats.size, narrowed ? k * this.config.searchOverfetch : k);
        let results: SearchResult[];
        for (;;) {
            const hits = this.vectorIndex.search(handle, queryVector, fetchK, { metric: this.config.distanceMetric });
            results = this.select(handle, hits, k, filters, dates);
            if (results.length >= k || fetchK >= stats.size) {
                break;
            }
            fetchK = Math.min(stats.size, fetchK * 2);
        }

        this.logger.log(`🔍 "${query}": ${results.length} results (k=${k}, fetched ${fetchK}) in ${Date.now() - startTime}ms`);
        return { results, stats };
    }

    private select(
        handle: IndexHandle,
        hits: ScoredChunk[],
        k: number,
        filters: SearchFilters | undefined,
        dates: DateBounds,
    ): SearchResult[] {
        const perDocumentCap = this.config.maxChunksPerDocumentInResults;
        const perDocument = new Map<string, number>();
        const results: SearchResult[] = [];

        for (const hit of hits) {
            if (results.length >= k) {
                break;
            }
            const record = this.vectorIndex.getRecord(handle, hit.chunkId);
            if (!record) {
                throw new IndexUnavailableError(`Chunk ${hit.chunkId} has no sidecar record`);
            }
            if (!matchesFilters(record, filters, dates)) {
                continue;
            }

            const seen = perDocument.get(record.documentId) ?? 0;
            if (perDocumentCap > 0 && seen >= perDocumentCap) {
                continue;
            }
            perDocument.set(record.documentId, seen + 1);

            results.push({
                chunkId: record.chunkId,
                score: hit.score,
                text: record.text,
                documentId: record.documentId,
                sequenceIndex: record.sequenceIndex,
                startOffset: record.startOffset,
                endOffset: record.endOffset,
                document: record.document ?? {},
            });
        }
        return results;
    }

    /**
     * Search with additional context information
     */
    async searchWithContext(query: string, k: number, filters?: SearchFilters): Promise<SearchContext> {
        const { results, stats } = await this.run(query, k, filters);

        return {
            query,
            numResults: results.length,
            results,
            indexStats: {
                totalChunks: stats.size,
                model: stats.modelId,
                metric: stats.metric,
                indexType: stats.indexType,
            },
        };
    }
}
