/**
 * A loaded embedding model. One instance is shared per process.
 */
export interface EmbeddingModel {
    readonly modelId: string;
    readonly dimension: number;
    /** one vector per input, in input order */
    embedBatch(texts: string[]): Promise<number[][]>;
    close?(): Promise<void>;
}

export interface EmbeddingModelLoadContext {
    openaiApiKey?: string;
    openaiBaseUrl?: string;
}

export type EmbeddingModelLoader = (modelId: string, context: EmbeddingModelLoadContext) => Promise<EmbeddingModel>;

export const EMBEDDING_MODEL_LOADER = Symbol('EMBEDDING_MODEL_LOADER');
