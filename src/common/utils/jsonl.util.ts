import { createReadStream } from 'fs';
import { mkdir, open } from 'fs/promises';
import { dirname } from 'path';
import { createInterface } from 'readline';
import { getErrorMessage, InvalidArgumentError } from '../errors';

export interface JsonLine {
    lineNumber: number;
    value: unknown;
}

/**
 * Stream the JSON values of a newline-delimited file, skipping blank lines
 */
export async function* readJsonLines(filePath: string): AsyncGenerator<JsonLine> {
    const lines = createInterface({
        input: createReadStream(filePath, { encoding: 'utf-8' }),
        crlfDelay: Infinity,
    });

    let lineNumber = 0;
    try {
        for await (const line of lines) {
            lineNumber++;
            const trimmed = line.trim();
            if (trimmed.length === 0) {
                continue;
            }

            let value: unknown;
            try {
                value = JSON.parse(trimmed);
            } catch (error) {
                throw new InvalidArgumentError(`${filePath}:${lineNumber}: invalid JSON (${getErrorMessage(error)})`, error);
            }
            yield { lineNumber, value };
        }
    } finally {
        lines.close();
    }
}

/**
 * Write one JSON value per line, creating parent directories. Returns the record count.
 */
export async function writeJsonLines<T>(
    filePath: string,
    records: AsyncIterable<T> | Iterable<T>,
): Promise<number> {
    await mkdir(dirname(filePath), { recursive: true });
    const handle = await open(filePath, 'w');

    let count = 0;
    try {
        for await (const record of records) {
            await handle.write(`${JSON.stringify(record)}\n`);
            count++;
        }
    } finally {
        await handle.close();
    }
    return count;
}
