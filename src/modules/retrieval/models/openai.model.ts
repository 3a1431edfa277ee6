import { Logger } from '@nestjs/common';
import { getErrorMessage, ModelUnavailableError } from '../../../common/errors';
import { EmbeddingModel } from './types';

/**
 * The part of the OpenAI SDK client the embedder uses
 */
export interface EmbeddingsClient {
    embeddings: {
        create(body: {
            model: string;
            input: string[];
            encoding_format: 'float';
        }): PromiseLike<{ data: Array<{ embedding: number[]; index: number }> }>;
    };
}

/**
 * OpenAI embeddings API - Native OpenAI SDK Integration
 */
export class OpenAIEmbeddingModel implements EmbeddingModel {
    private static readonly logger = new Logger(OpenAIEmbeddingModel.name);

    private constructor(
        private readonly client: EmbeddingsClient,
        private readonly modelName: string,
        readonly dimension: number,
    ) { }

    get modelId(): string {
        return `openai/${this.modelName}`;
    }

    /**
     * Embed one sample text to learn the model's dimension
     */
    static async connect(client: EmbeddingsClient, modelName: string): Promise<OpenAIEmbeddingModel> {
        let dimension: number;
        try {
            const [sample] = await OpenAIEmbeddingModel.request(client, modelName, ['dimension check']);
            dimension = sample.length;
        } catch (error) {
            throw new ModelUnavailableError(`OpenAI model ${modelName} is unavailable: ${getErrorMessage(error)}`, error);
        }

        OpenAIEmbeddingModel.logger.log(`✅ OpenAI embedding model ${modelName} ready (${dimension} dimensions)`);
        return new OpenAIEmbeddingModel(client, modelName, dimension);
    }

    private static async request(client: EmbeddingsClient, model: string, input: string[]): Promise<number[][]> {
        const response = await client.embeddings.create({
            model,
            input,
            encoding_format: 'float',
        });

        return response.data
            .slice()
            .sort((a, b) => a.index - b.index)
            .map((item) => item.embedding);
    }

    async embedBatch(texts: string[]): Promise<number[][]> {
        OpenAIEmbeddingModel.logger.debug(`🔄 Generating embeddings for ${texts.length} texts`);
        return OpenAIEmbeddingModel.request(this.client, this.modelName, texts);
    }
}
