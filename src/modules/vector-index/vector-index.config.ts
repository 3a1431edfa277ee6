/**
 * Vector Index Configuration
 */
export const vectorIndexConfig = {
    // On-disk layout
    files: {
        config: 'config.json',
        vectors: 'vectors.f64',
        sidecar: 'meta.jsonl',
    },
    formatVersion: 1,

    // IVF training
    ivf: {
        maxIterations: 25,
    },

    // Arena growth
    arena: {
        initialCapacity: 64,
        growthFactor: 2,
    },
};
