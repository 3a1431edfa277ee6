/**
 * Core Retrieval Type Definitions (Framework-Free)
 */

/**
 * Source metadata supplied by the ingestion stage
 */
export interface DocumentMetadata {
    title?: string;
    authors?: string[];
    categories?: string[];
    /** ISO-8601 date */
    published?: string;
}

/**
 * Document produced upstream; immutable once produced
 */
export interface Document {
    id: string;
    text: string;
    metadata: DocumentMetadata;
}

/**
 * Contiguous window of a document's text
 */
export interface Chunk {
    chunkId: string;
    documentId: string;
    text: string;
    startOffset: number;
    endOffset: number;
    sequenceIndex: number;
    document?: DocumentMetadata;
}

export interface EmbeddedChunk extends Chunk {
    vector: number[];
    modelId: string;
}

/**
 * Ranked chunk returned to callers; never persisted
 */
export interface SearchResult {
    chunkId: string;
    score: number;
    text: string;
    documentId: string;
    sequenceIndex: number;
    startOffset: number;
    endOffset: number;
    document: DocumentMetadata;
}

/**
 * Post-search filters applied by the retriever
 */
export interface SearchFilters {
    documentIds?: string[];
    categories?: string[];
    /** inclusive, ISO-8601 */
    publishedAfter?: string;
    /** inclusive, ISO-8601 */
    publishedBefore?: string;
}

export interface SearchContext {
    query: string;
    numResults: number;
    results: SearchResult[];
    indexStats: {
        totalChunks: number;
        model: string;
        metric: string;
        indexType: string;
    };
}

export interface ChunkingOptions {
    windowSize: number;
    overlap: number;
    unit?: 'characters' | 'tokens';
}
