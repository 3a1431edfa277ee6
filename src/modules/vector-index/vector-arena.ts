import { vectorIndexConfig } from './vector-index.config';

interface ArenaBuffer {
    values: Float64Array;
    /** rows written so far by any view of this buffer */
    used: number;
}

/**
 * Row-major float64 storage addressed by stable row offsets.
 *
 * An arena value is an immutable view of rows [0, size). `append` writes past
 * `size` and returns a new view, sharing the buffer while capacity allows, so
 * earlier views keep reading exactly the rows they were created with. Appending
 * to a view that is no longer the newest copies the buffer first.
 */
export class VectorArena {
    private constructor(
        readonly dimension: number,
        readonly size: number,
        private readonly buffer: ArenaBuffer,
    ) { }

    static empty(dimension: number, capacity = vectorIndexConfig.arena.initialCapacity): VectorArena {
        return new VectorArena(dimension, 0, { values: new Float64Array(Math.max(capacity, 1) * dimension), used: 0 });
    }

    static fromBuffer(dimension: number, data: Float64Array): VectorArena {
        const size = dimension === 0 ? 0 : data.length / dimension;
        return new VectorArena(dimension, size, { values: data, used: size });
    }

    get capacity(): number {
        return this.dimension === 0 ? 0 : this.buffer.values.length / this.dimension;
    }

    row(offset: number): Float64Array {
        if (offset < 0 || offset >= this.size) {
            throw new RangeError(`Row ${offset} is outside the arena (size ${this.size})`);
        }
        return this.buffer.values.subarray(offset * this.dimension, (offset + 1) * this.dimension);
    }

    append(rows: Float64Array[]): VectorArena {
        const required = this.size + rows.length;
        let buffer = this.buffer;

        if (required > this.capacity || buffer.used !== this.size) {
            let capacity = Math.max(this.capacity, 1);
            while (capacity < required) {
                capacity *= vectorIndexConfig.arena.growthFactor;
            }
            buffer = { values: new Float64Array(capacity * this.dimension), used: this.size };
            buffer.values.set(this.buffer.values.subarray(0, this.size * this.dimension));
        }

        rows.forEach((row, i) => buffer.values.set(row, (this.size + i) * this.dimension));
        buffer.used = required;
        return new VectorArena(this.dimension, required, buffer);
    }

    /**
     * Copy of the committed rows only
     */
    toFloat64Array(): Float64Array {
        return this.buffer.values.slice(0, this.size * this.dimension);
    }
}
