import { Inject, Injectable, Logger, OnModuleDestroy, Optional } from '@nestjs/common';
import { ConfigService, ConfigType } from '@nestjs/config';
import OpenAI from 'openai';
import retrievalConfig from '../../../config/retrieval.config';
import { getErrorMessage, InvalidConfigurationError, ModelUnavailableError, RetrievalError } from '../../../common/errors';
import { HashingEmbeddingModel } from './hashing.model';
import { OpenAIEmbeddingModel } from './openai.model';
import { EMBEDDING_MODEL_LOADER, EmbeddingModel, EmbeddingModelLoadContext, EmbeddingModelLoader } from './types';

/**
 * Resolve a model id (`hashing/<dim>` or `openai/<model>`) to a loaded model
 */
export const loadEmbeddingModel: EmbeddingModelLoader = async (modelId, context) => {
    const separator = modelId.indexOf('/');
    const scheme = modelId.slice(0, separator);
    const name = modelId.slice(separator + 1);

    switch (scheme) {
        case 'hashing': {
            const dimension = parseInt(name, 10);
            if (!Number.isInteger(dimension) || dimension <= 0) {
                throw new InvalidConfigurationError(`Invalid hashing model dimension: ${modelId}`);
            }
            return new HashingEmbeddingModel(dimension);
        }
        case 'openai': {
            if (!context.openaiApiKey) {
                throw new ModelUnavailableError('OPENAI_API_KEY environment variable is not set');
            }
            const client = new OpenAI({
                apiKey: context.openaiApiKey,
                baseURL: context.openaiBaseUrl,
            });
            return OpenAIEmbeddingModel.connect(client, name);
        }
        default:
            throw new InvalidConfigurationError(`Unknown embedding model: ${modelId}`);
    }
};

/**
 * Owns the process-wide embedding model: loaded on first use, dropped by `reset()`
 */
@Injectable()
export class EmbeddingModelProvider implements OnModuleDestroy {
    private readonly logger = new Logger(EmbeddingModelProvider.name);
    private readonly loader: EmbeddingModelLoader;
    private model?: EmbeddingModel;
    private loading?: Promise<EmbeddingModel>;

    constructor(
        @Inject(retrievalConfig.KEY) private readonly config: ConfigType<typeof retrievalConfig>,
        private readonly configService: ConfigService,
        @Optional() @Inject(EMBEDDING_MODEL_LOADER) loader?: EmbeddingModelLoader,
    ) {
        this.loader = loader ?? loadEmbeddingModel;
    }

    get modelId(): string {
        return this.config.embeddingModelId;
    }

    get isLoaded(): boolean {
        return this.model !== undefined;
    }

    async get(): Promise<EmbeddingModel> {
        if (this.model) {
            return this.model;
        }
        if (!this.loading) {
            this.loading = this.load().finally(() => {
                this.loading = undefined;
            });
        }
        return this.loading;
    }

    private async load(): Promise<EmbeddingModel> {
        const context: EmbeddingModelLoadContext = {
            openaiApiKey: this.configService.get<string>('OPENAI_API_KEY'),
            openaiBaseUrl: this.configService.get<string>('OPENAI_BASE_URL'),
        };

        this.logger.log(`🔄 Loading embedding model ${this.modelId}`);
        let model: EmbeddingModel;
        try {
            model = await this.loader(this.modelId, context);
        } catch (error) {
            if (error instanceof RetrievalError) {
                throw error;
            }
            throw new ModelUnavailableError(`Cannot load embedding model ${this.modelId}: ${getErrorMessage(error)}`, error);
        }

        if (model.modelId !== this.modelId) {
            throw new ModelUnavailableError(`Loader returned ${model.modelId} for ${this.modelId}`);
        }
        this.model = model;
        this.logger.log(`✅ Embedding model ${model.modelId} loaded (${model.dimension} dimensions)`);
        return model;
    }

    /**
     * Drop the cached model; the next call loads it again
     */
    async reset(): Promise<void> {
        const model = this.model;
        this.model = undefined;
        if (model?.close) {
            await model.close();
        }
    }

    async onModuleDestroy() {
        await this.reset();
    }
}
