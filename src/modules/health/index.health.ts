import { Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult, HealthCheckError } from '@nestjs/terminus';
import { getErrorMessage } from '../../common/errors';
import { RetrieverService } from '../retrieval/services/retriever.service';

@Injectable()
export class IndexHealthIndicator extends HealthIndicator {
    constructor(private readonly retriever: RetrieverService) {
        super();
    }

    async isHealthy(key: string): Promise<HealthIndicatorResult> {
        try {
            const stats = await this.retriever.indexStats();
            return this.getStatus(key, true, { size: stats.size, model: stats.modelId, metric: stats.metric });
        } catch (error) {
            throw new HealthCheckError(
                'Index health check failed',
                this.getStatus(key, false, { message: getErrorMessage(error) }),
            );
        }
    }
}
