import { readFile, writeFile } from 'node:fs/promises';
import { createServiceLogger, type Logger } from '@fxrates/observability';

/**
 * Local copies of raw service responses, used during development so that
 * repeated runs do not spend API quota. Failures here are logged, never thrown.
 */

const defaultLogger = createServiceLogger({ service: 'saved-query' });

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/** `exchange-rate-YYYY-MM-DD.txt` for the UTC date of `date`. */
export function savedQueryFilename(date: Date = new Date()): string {
    return `exchange-rate-${date.toISOString().slice(0, 10)}.txt`;
}

/** Overwrite `filename` with `data`. Resolves to false when the write fails. */
export async function saveQueryResult(data: string, filename: string, logger: Logger = defaultLogger): Promise<boolean> {
    try {
        await writeFile(filename, data, 'utf8');
        logger.info('Saved exchange rate response', { filename, bytes: data.length });
        return true;
    } catch (error) {
        logger.warn('Could not write exchange rate response to file', { filename, error: errorMessage(error) });
        return false;
    }
}

/** Contents of `filename`, or an empty string when it cannot be read. */
export async function readSavedQuery(filename: string, logger: Logger = defaultLogger): Promise<string> {
    try {
        const data = await readFile(filename, 'utf8');
        logger.info('Using saved exchange rate response', { filename, bytes: data.length });
        return data;
    } catch (error) {
        logger.warn('Could not read saved exchange rate response', { filename, error: errorMessage(error) });
        return '';
    }
}
