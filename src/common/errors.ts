/**
 * Error codes raised by the indexing and retrieval core.
 */
export enum ErrorCode {
    INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
    INVALID_ARGUMENT = 'INVALID_ARGUMENT',
    DIMENSION_MISMATCH = 'DIMENSION_MISMATCH',
    EMPTY_BATCH = 'EMPTY_BATCH',
    EMBEDDING_ERROR = 'EMBEDDING_ERROR',
    MODEL_UNAVAILABLE = 'MODEL_UNAVAILABLE',
    CORRUPT_INDEX = 'CORRUPT_INDEX',
    INDEX_UNAVAILABLE = 'INDEX_UNAVAILABLE',
}

/**
 * Base class for every error the core raises. None of them is retried internally.
 */
export class RetrievalError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        cause?: unknown,
    ) {
        super(message);
        this.name = 'RetrievalError';
        if (cause !== undefined) {
            this.cause = cause;
        }
    }
}

export class InvalidConfigurationError extends RetrievalError {
    constructor(message: string, cause?: unknown) {
        super(ErrorCode.INVALID_CONFIGURATION, message, cause);
        this.name = 'InvalidConfigurationError';
    }
}

export class InvalidArgumentError extends RetrievalError {
    constructor(message: string, cause?: unknown) {
        super(ErrorCode.INVALID_ARGUMENT, message, cause);
        this.name = 'InvalidArgumentError';
    }
}

export class DimensionMismatchError extends RetrievalError {
    constructor(message: string) {
        super(ErrorCode.DIMENSION_MISMATCH, message);
        this.name = 'DimensionMismatchError';
    }
}

export class EmptyBatchError extends RetrievalError {
    constructor(message = 'Cannot build an index from zero chunks') {
        super(ErrorCode.EMPTY_BATCH, message);
        this.name = 'EmptyBatchError';
    }
}

export class EmbeddingError extends RetrievalError {
    constructor(message: string, cause?: unknown) {
        super(ErrorCode.EMBEDDING_ERROR, message, cause);
        this.name = 'EmbeddingError';
    }
}

export class ModelUnavailableError extends RetrievalError {
    constructor(message: string, cause?: unknown) {
        super(ErrorCode.MODEL_UNAVAILABLE, message, cause);
        this.name = 'ModelUnavailableError';
    }
}

export class CorruptIndexError extends RetrievalError {
    constructor(message: string, cause?: unknown) {
        super(ErrorCode.CORRUPT_INDEX, message, cause);
        this.name = 'CorruptIndexError';
    }
}

export class IndexUnavailableError extends RetrievalError {
    constructor(message = 'No index has been built or loaded') {
        super(ErrorCode.INDEX_UNAVAILABLE, message);
        this.name = 'IndexUnavailableError';
    }
}

/**
 * Get a printable message from anything that was thrown
 */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
