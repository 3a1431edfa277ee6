import { mkdir, readFile, rename, rm, stat, writeFile } from 'fs/promises';
import { basename, dirname, join, resolve } from 'path';
import { z } from 'zod';
import { DISTANCE_METRICS, INDEX_TYPES } from '../../config/retrieval.config';
import { CorruptIndexError, getErrorMessage, IndexUnavailableError } from '../../common/errors';
import { createContentHash } from '../../common/utils/hash.util';
import { chunkRecordSchema, fromChunkRecord, toChunkRecord } from '../retrieval/utils/chunk-corpus';
import { IndexState, IvfState, SidecarRecord } from './types/vector-index.types';
import { VectorArena } from './vector-arena';
import { vectorIndexConfig } from './vector-index.config';

const { files } = vectorIndexConfig;

let saveSequence = 0;

const persistedConfigSchema = z.object({
    format_version: z.literal(vectorIndexConfig.formatVersion),
    model_id: z.string().min(1),
    dimension: z.number().int().positive(),
    metric: z.enum(DISTANCE_METRICS),
    index_type: z.enum(INDEX_TYPES),
    nlist: z.number().int().positive(),
    nprobe: z.number().int().positive(),
    seed: z.number().int().nonnegative(),
    count: z.number().int().nonnegative(),
    chunk_ids: z.array(z.string().min(1)),
    vectors_sha256: z.string().regex(/^[0-9a-f]{64}$/),
    ivf: z
        .object({
            centroids: z.array(z.array(z.number())),
            lists: z.array(z.array(z.number().int().nonnegative())),
        })
        .nullable(),
    saved_at: z.string(),
});

type PersistedConfig = z.infer<typeof persistedConfigSchema>;

/**
 * Everything `load` recovers; the duplicate policy comes from configuration
 */
export type PersistedIndex = Omit<IndexState, 'options'> & {
    options: Omit<IndexState['options'], 'duplicatePolicy'>;
};

function encodeVectors(arena: VectorArena): Buffer {
    const values = arena.toFloat64Array();
    const buffer = Buffer.alloc(values.length * Float64Array.BYTES_PER_ELEMENT);
    values.forEach((value, i) => buffer.writeDoubleLE(value, i * Float64Array.BYTES_PER_ELEMENT));
    return buffer;
}

function decodeVectors(buffer: Buffer): Float64Array {
    const values = new Float64Array(buffer.length / Float64Array.BYTES_PER_ELEMENT);
    for (let i = 0; i < values.length; i++) {
        values[i] = buffer.readDoubleLE(i * Float64Array.BYTES_PER_ELEMENT);
    }
    return values;
}

function encodeSidecar(records: readonly SidecarRecord[]): string {
    return records.map((record) => `${JSON.stringify(toChunkRecord(record))}\n`).join('');
}

function decodeSidecar(content: string): SidecarRecord[] {
    return content
        .split('\n')
        .filter((line) => line.trim().length > 0)
        .map((line, i) => {
            let value: unknown;
            try {
                value = JSON.parse(line);
            } catch (error) {
                throw new CorruptIndexError(`${files.sidecar} line ${i + 1} is not valid JSON`, error);
            }
            const result = chunkRecordSchema.safeParse(value);
            if (!result.success) {
                throw new CorruptIndexError(`${files.sidecar} line ${i + 1} is not a chunk record`);
            }
            return fromChunkRecord(result.data);
        });
}

/**
 * fs errors may come from another realm, so match on the code rather than `instanceof Error`
 */
function isMissing(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

async function pathExists(path: string): Promise<boolean> {
    try {
        await stat(path);
        return true;
    } catch (error) {
        if (isMissing(error)) {
            return false;
        }
        throw error;
    }
}

/**
 * Write the three artifacts into a staging directory, then swap it into place
 */
export async function saveIndex(state: IndexState, location: string): Promise<void> {
    const target = resolve(location);
    const stamp = `${process.pid}-${Date.now()}-${saveSequence++}`;
    const staging = join(dirname(target), `.${basename(target)}.staging-${stamp}`);
    const previous = join(dirname(target), `.${basename(target)}.previous-${stamp}`);

    const vectors = encodeVectors(state.arena);
    const config: PersistedConfig = {
        format_version: vectorIndexConfig.formatVersion,
        model_id: state.modelId,
        dimension: state.dimension,
        metric: state.options.metric,
        index_type: state.options.indexType,
        nlist: state.options.nlist,
        nprobe: state.options.nprobe,
        seed: state.options.seed,
        count: state.records.length,
        chunk_ids: state.records.map((record) => record.chunkId),
        vectors_sha256: createContentHash(vectors),
        ivf: state.ivf
            ? {
                centroids: state.ivf.centroids.map((centroid) => Array.from(centroid)),
                lists: state.ivf.lists.map((list) => list.slice()),
            }
            : null,
        saved_at: new Date().toISOString(),
    };

    await mkdir(staging, { recursive: true });
    try {
        await writeFile(join(staging, files.vectors), vectors);
        await writeFile(join(staging, files.sidecar), encodeSidecar(state.records), 'utf-8');
        await writeFile(join(staging, files.config), JSON.stringify(config, null, 2), 'utf-8');
    } catch (error) {
        await rm(staging, { recursive: true, force: true });
        throw error;
    }

    const hadPrevious = await pathExists(target);
    if (hadPrevious) {
        await rename(target, previous);
    }
    try {
        await rename(staging, target);
    } catch (error) {
        if (hadPrevious) {
            await rename(previous, target);
        }
        await rm(staging, { recursive: true, force: true });
        throw error;
    }
    if (hadPrevious) {
        await rm(previous, { recursive: true, force: true });
    }
}

async function readOptional<T>(read: () => Promise<T>): Promise<T | undefined> {
    try {
        return await read();
    } catch (error) {
        if (isMissing(error)) {
            return undefined;
        }
        throw error;
    }
}

async function readArtifacts(target: string): Promise<{ config: string; vectors: Buffer; sidecar: string }> {
    const [config, vectors, sidecar] = await Promise.all([
        readOptional(() => readFile(join(target, files.config), 'utf-8')),
        readOptional(() => readFile(join(target, files.vectors))),
        readOptional(() => readFile(join(target, files.sidecar), 'utf-8')),
    ]);

    if (config === undefined && vectors === undefined && sidecar === undefined) {
        throw new IndexUnavailableError(`No index found at ${target}`);
    }
    if (config === undefined || vectors === undefined || sidecar === undefined) {
        const missing = [
            config === undefined ? files.config : undefined,
            vectors === undefined ? files.vectors : undefined,
            sidecar === undefined ? files.sidecar : undefined,
        ].filter((name): name is string => name !== undefined);
        throw new CorruptIndexError(`Index at ${target} is incomplete: missing ${missing.join(', ')}`);
    }
    return { config, vectors, sidecar };
}

function parseConfig(content: string): PersistedConfig {
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        throw new CorruptIndexError(`${files.config} is not valid JSON: ${getErrorMessage(error)}`, error);
    }
    const result = persistedConfigSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new CorruptIndexError(`${files.config} is malformed (${issue.path.join('.')}: ${issue.message})`);
    }
    return result.data;
}

function restoreIvf(config: PersistedConfig): IvfState | undefined {
    if (config.ivf === null) {
        return undefined;
    }
    if (config.index_type !== 'ivf_flat') {
        throw new CorruptIndexError(`IVF lists present on a ${config.index_type} index`);
    }

    const { centroids, lists } = config.ivf;
    if (centroids.length === 0 || centroids.length !== lists.length) {
        throw new CorruptIndexError('IVF centroids and lists disagree');
    }
    if (centroids.some((centroid) => centroid.length !== config.dimension)) {
        throw new CorruptIndexError('IVF centroid has the wrong dimension');
    }

    const seen = new Uint8Array(config.count);
    for (const row of lists.flat()) {
        if (row >= config.count || seen[row] === 1) {
            throw new CorruptIndexError(`IVF lists reference row ${row} invalidly`);
        }
        seen[row] = 1;
    }
    if (seen.some((flag) => flag === 0)) {
        throw new CorruptIndexError('IVF lists do not cover every row');
    }

    return {
        centroids: centroids.map((centroid) => Float64Array.from(centroid)),
        lists: lists.map((list) => list.slice()),
    };
}

/**
 * Read and cross-check the artifacts at `location`
 */
export async function loadIndex(location: string): Promise<PersistedIndex> {
    const target = resolve(location);
    const artifacts = await readArtifacts(target);
    const config = parseConfig(artifacts.config);

    if (createContentHash(artifacts.vectors) !== config.vectors_sha256) {
        throw new CorruptIndexError(`${files.vectors} checksum does not match ${files.config}`);
    }
    const expectedBytes = config.count * config.dimension * Float64Array.BYTES_PER_ELEMENT;
    if (artifacts.vectors.length !== expectedBytes) {
        throw new CorruptIndexError(`${files.vectors} holds ${artifacts.vectors.length} bytes, expected ${expectedBytes}`);
    }

    const records = decodeSidecar(artifacts.sidecar);
    if (records.length !== config.count || config.chunk_ids.length !== config.count) {
        throw new CorruptIndexError(
            `Row counts disagree: ${files.config}=${config.count}, chunk_ids=${config.chunk_ids.length}, ${files.sidecar}=${records.length}`,
        );
    }

    const rowsById = new Map<string, number>();
    records.forEach((record, row) => {
        if (record.chunkId !== config.chunk_ids[row]) {
            throw new CorruptIndexError(`Row ${row}: sidecar has ${record.chunkId}, ${files.config} has ${config.chunk_ids[row]}`);
        }
        if (rowsById.has(record.chunkId)) {
            throw new CorruptIndexError(`Duplicate chunk id ${record.chunkId}`);
        }
        rowsById.set(record.chunkId, row);
    });

    return {
        modelId: config.model_id,
        dimension: config.dimension,
        options: {
            metric: config.metric,
            indexType: config.index_type,
            nlist: config.nlist,
            nprobe: config.nprobe,
            seed: config.seed,
        },
        arena: VectorArena.fromBuffer(config.dimension, decodeVectors(artifacts.vectors)),
        records,
        rowsById,
        ivf: restoreIvf(config),
    };
}
