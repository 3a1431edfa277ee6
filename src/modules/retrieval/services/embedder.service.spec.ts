import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import retrievalConfig from '../../../config/retrieval.config';
import { EmbeddingError, InvalidConfigurationError, ModelUnavailableError } from '../../../common/errors';
import { testConfig } from '../../../testing/fixtures';
import { EmbeddingModelProvider, loadEmbeddingModel } from '../models/embedding-model.provider';
import { HashingEmbeddingModel } from '../models/hashing.model';
import { EmbeddingsClient, OpenAIEmbeddingModel } from '../models/openai.model';
import { EMBEDDING_MODEL_LOADER, EmbeddingModel, EmbeddingModelLoader } from '../models/types';
import { EmbedderService } from './embedder.service';

class RecordingModel implements EmbeddingModel {
    readonly modelId = 'hashing/8';
    readonly dimension = 8;
    readonly batches: string[][] = [];
    readonly close = jest.fn(async () => undefined);
    private readonly inner = new HashingEmbeddingModel(8);

    constructor(private readonly output?: (texts: string[]) => number[][]) { }

    async embedBatch(texts: string[]): Promise<number[][]> {
        this.batches.push(texts);
        return this.output ? this.output(texts) : this.inner.embedBatch(texts);
    }
}

async function createEmbedder(batchSize: number, loader?: EmbeddingModelLoader) {
    const moduleRef = await Test.createTestingModule({
        providers: [
            EmbedderService,
            EmbeddingModelProvider,
            { provide: retrievalConfig.KEY, useValue: testConfig({ embedding_model_id: 'hashing/8', embedding_batch_size: batchSize }) },
            { provide: ConfigService, useValue: new ConfigService({}) },
            ...(loader ? [{ provide: EMBEDDING_MODEL_LOADER, useValue: loader }] : []),
        ],
    }).compile();

    return {
        embedder: moduleRef.get(EmbedderService),
        provider: moduleRef.get(EmbeddingModelProvider),
    };
}

describe('EmbedderService', () => {
    const texts = ['graph neural networks', 'diffusion models', 'contrastive learning', 'attention', 'retrieval'];

    it('embeds in batches and preserves order', async () => {
        const model = new RecordingModel();
        const { embedder } = await createEmbedder(2, async () => model);

        const vectors = await embedder.embed(texts);

        expect(model.batches.map((batch) => batch.length)).toEqual([2, 2, 1]);
        expect(vectors).toEqual(texts.map((text) => new HashingEmbeddingModel(8).embedText(text)));
    });

    it('gives the same vectors whatever the batch size', async () => {
        const small = await createEmbedder(2);
        const large = await createEmbedder(64);

        expect(await small.embedder.embed(texts)).toEqual(await large.embedder.embed(texts));
    });

    it('returns nothing for no texts', async () => {
        const loader = jest.fn(async () => new RecordingModel());
        const { embedder } = await createEmbedder(2, loader);

        await expect(embedder.embed([])).resolves.toEqual([]);
        expect(loader).not.toHaveBeenCalled();
    });

    it('rejects empty text before calling the model', async () => {
        const model = new RecordingModel();
        const { embedder } = await createEmbedder(2, async () => model);

        await expect(embedder.embed(['fine', '   '])).rejects.toThrow(EmbeddingError);
        await expect(embedder.embedQuery('')).rejects.toThrow('Cannot embed empty text (position 0)');
        expect(model.batches).toEqual([]);
    });

    it('rejects text that embeds to the zero vector', async () => {
        const { embedder } = await createEmbedder(2);

        await expect(embedder.embed(['fine', 'good', '?!'])).rejects.toThrow('Text at position 2 has no embeddable content');
        await expect(embedder.embedQuery('...')).rejects.toThrow(EmbeddingError);
    });

    it('rejects a model that returns the wrong number of vectors', async () => {
        const { embedder } = await createEmbedder(2, async () => new RecordingModel(() => []));

        await expect(embedder.embed(['one'])).rejects.toThrow('Model returned 0 vectors for 1 texts');
    });

    it('rejects non-finite vector components', async () => {
        const { embedder } = await createEmbedder(2, async () => new RecordingModel((batch) => batch.map(() => new Array(8).fill(NaN))));

        await expect(embedder.embed(['one'])).rejects.toThrow(EmbeddingError);
    });

    it('wraps model failures in EmbeddingError', async () => {
        const { embedder } = await createEmbedder(2, async () =>
            new RecordingModel(() => {
                throw new Error('backend exploded');
            }),
        );

        await expect(embedder.embed(['one'])).rejects.toThrow('Embedding batch 0 failed: backend exploded');
    });

    it('tags embedded chunks with the model id', async () => {
        const { embedder } = await createEmbedder(2);

        const [embedded] = await embedder.embedChunks([
            { chunkId: 'a#000000', documentId: 'a', text: 'text', startOffset: 0, endOffset: 4, sequenceIndex: 0 },
        ]);

        expect(embedded.modelId).toBe('hashing/8');
        expect(embedded.vector).toHaveLength(8);
        expect(embedder.modelId).toBe('hashing/8');
        await expect(embedder.getDimension()).resolves.toBe(8);
    });
});

describe('EmbeddingModelProvider', () => {
    it('loads the model once for concurrent callers', async () => {
        const loader = jest.fn(async () => new RecordingModel());
        const { provider } = await createEmbedder(2, loader);

        const [first, second] = await Promise.all([provider.get(), provider.get()]);

        expect(first).toBe(second);
        expect(loader).toHaveBeenCalledTimes(1);
        expect(provider.isLoaded).toBe(true);
    });

    it('reports load failures as ModelUnavailable and retries on the next call', async () => {
        const loader = jest
            .fn<Promise<EmbeddingModel>, Parameters<EmbeddingModelLoader>>()
            .mockRejectedValueOnce(new Error('network down'))
            .mockResolvedValueOnce(new RecordingModel());
        const { embedder } = await createEmbedder(2, loader);

        await expect(embedder.embed(['one'])).rejects.toThrow(ModelUnavailableError);
        await expect(embedder.embed(['one'])).resolves.toHaveLength(1);
        expect(loader).toHaveBeenCalledTimes(2);
    });

    it('rejects a loader that returns another model', async () => {
        const { provider } = await createEmbedder(2, async () => new HashingEmbeddingModel(16));

        await expect(provider.get()).rejects.toThrow('Loader returned hashing/16 for hashing/8');
    });

    it('closes the model on reset and loads it again', async () => {
        const model = new RecordingModel();
        const loader = jest.fn(async () => model);
        const { provider } = await createEmbedder(2, loader);

        await provider.get();
        await provider.reset();

        expect(model.close).toHaveBeenCalledTimes(1);
        expect(provider.isLoaded).toBe(false);
        await provider.get();
        expect(loader).toHaveBeenCalledTimes(2);
    });
});

describe('loadEmbeddingModel', () => {
    it('builds hashing models locally', async () => {
        const model = await loadEmbeddingModel('hashing/16', {});

        expect(model.modelId).toBe('hashing/16');
        expect(model.dimension).toBe(16);
    });

    it('requires an API key for OpenAI models', async () => {
        await expect(loadEmbeddingModel('openai/text-embedding-3-small', {})).rejects.toThrow(ModelUnavailableError);
    });

    it('rejects unknown schemes', async () => {
        await expect(loadEmbeddingModel('bert/base', {})).rejects.toThrow(InvalidConfigurationError);
    });
});

describe('OpenAIEmbeddingModel', () => {
    function fakeClient(create: EmbeddingsClient['embeddings']['create']): EmbeddingsClient {
        return { embeddings: { create } };
    }

    it('detects the dimension and orders results by index', async () => {
        const create = jest.fn(async (body: { model: string; input: string[] }) => ({
            data: body.input
                .map((text, index) => ({ embedding: [text.length, index, 1], index }))
                .reverse(),
        }));
        const model = await OpenAIEmbeddingModel.connect(fakeClient(create), 'fake-model');

        const vectors = await model.embedBatch(['a', 'bbb']);

        expect(model.modelId).toBe('openai/fake-model');
        expect(model.dimension).toBe(3);
        expect(vectors).toEqual([
            [1, 0, 1],
            [3, 1, 1],
        ]);
        expect(create).toHaveBeenLastCalledWith({ model: 'fake-model', input: ['a', 'bbb'], encoding_format: 'float' });
    });

    it('reports an unreachable API as ModelUnavailable', async () => {
        const client = fakeClient(async () => {
            throw new Error('401 Incorrect API key provided');
        });

        await expect(OpenAIEmbeddingModel.connect(client, 'fake-model')).rejects.toThrow(ModelUnavailableError);
    });
});
