import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { ErrorCode, RetrievalError } from '../errors';

const STATUS_BY_CODE: Record<ErrorCode, HttpStatus> = {
    [ErrorCode.INVALID_CONFIGURATION]: HttpStatus.BAD_REQUEST,
    [ErrorCode.INVALID_ARGUMENT]: HttpStatus.BAD_REQUEST,
    [ErrorCode.DIMENSION_MISMATCH]: HttpStatus.BAD_REQUEST,
    [ErrorCode.EMPTY_BATCH]: HttpStatus.BAD_REQUEST,
    [ErrorCode.EMBEDDING_ERROR]: HttpStatus.UNPROCESSABLE_ENTITY,
    [ErrorCode.MODEL_UNAVAILABLE]: HttpStatus.SERVICE_UNAVAILABLE,
    [ErrorCode.INDEX_UNAVAILABLE]: HttpStatus.SERVICE_UNAVAILABLE,
    [ErrorCode.CORRUPT_INDEX]: HttpStatus.INTERNAL_SERVER_ERROR,
};

export function statusForRetrievalError(error: RetrievalError): HttpStatus {
    return STATUS_BY_CODE[error.code];
}

/**
 * Maps core errors to HTTP responses: { statusCode, code, message }
 */
@Catch(RetrievalError)
export class RetrievalExceptionFilter implements ExceptionFilter {
    private readonly logger = new Logger(RetrievalExceptionFilter.name);

    catch(exception: RetrievalError, host: ArgumentsHost) {
        const statusCode = statusForRetrievalError(exception);
        if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
            this.logger.error(`❌ ${exception.code}: ${exception.message}`);
        } else {
            this.logger.warn(`⚠️ ${exception.code}: ${exception.message}`);
        }

        const response = host.switchToHttp().getResponse<Response>();
        response.status(statusCode).json({
            statusCode,
            code: exception.code,
            message: exception.message,
        });
    }
}
