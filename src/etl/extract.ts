import fs from 'fs';
import { parse, CsvError } from 'csv-parse';
import { isPipelineError, NotFoundError, ParseError, SourceError, ValidationError } from '../lib/errors';
import type { RowContract } from '../lib/schemas';
import type { RawRecord } from './types';

export interface ExtractOptions {
    /** Source columns to keep; every one of them must be in the header. */
    columns: readonly string[];
    contract?: RowContract;
    /** Keep only the first row for each trimmed value of this column; later ones are dropped unchecked. */
    distinctBy?: string;
}

const errorCode = (err: unknown): string | undefined =>
    typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string' ? err.code : undefined;

export const ensureReadableFile = async (filePath: string): Promise<void> => {
    let stat: fs.Stats;
    try {
        stat = await fs.promises.stat(filePath);
    } catch (err) {
        if (errorCode(err) === 'ENOENT') {
            throw new NotFoundError(filePath);
        }
        throw new SourceError(`Cannot read ${filePath}`, { cause: err });
    }
    if (!stat.isFile()) {
        throw new SourceError(`Not a regular file: ${filePath}`);
    }
};

const project = (record: Record<string, string>, columns: readonly string[]): RawRecord => {
    const out: RawRecord = {};
    for (const column of columns) {
        if (column in record) out[column] = record[column];
    }
    return out;
};

const toSourceError = (err: unknown, filePath: string): unknown => {
    if (isPipelineError(err)) return err;
    if (err instanceof CsvError) {
        const line = typeof err.lines === 'number' ? err.lines : undefined;
        return new ParseError(`Malformed CSV: ${err.message}`, line, { cause: err });
    }
    return new SourceError(`Cannot read ${filePath}`, { cause: err });
};

/**
 * Streams a headed CSV file as raw records restricted to `columns`. Fails with
 * NotFoundError before reading when the path is missing, with ParseError when
 * the text is not well-formed CSV or the header misses a required column, and
 * with ValidationError when a row breaks the row contract.
 */
export async function* extractCsv(filePath: string, options: ExtractOptions): AsyncGenerator<RawRecord> {
    await ensureReadableFile(filePath);

    const input = fs.createReadStream(filePath);
    const parser = parse({
        columns: true,
        bom: true,
        trim: true,
        skip_empty_lines: true,
        info: true,
    });
    input.on('error', (err) => parser.destroy(err));
    input.pipe(parser);

    let headerChecked = false;
    const seen = new Set<string>();
    try {
        for await (const entry of parser) {
            const row: Record<string, string> = entry.record;
            const line: number = entry.info.lines;
            if (!headerChecked) {
                const missing = options.columns.filter((column) => !(column in row));
                if (missing.length > 0) {
                    throw new ParseError(`Missing required columns: ${missing.join(', ')}`, 1);
                }
                headerChecked = true;
            }

            if (options.distinctBy !== undefined) {
                const key = (row[options.distinctBy] ?? '').trim();
                if (seen.has(key)) continue;
                seen.add(key);
            }

            const projected = project(row, options.columns);
            const problems = options.contract?.check(projected);
            if (options.contract && problems) {
                const detail = problems.map((p) => p.message).join('; ');
                throw new ValidationError(
                    `Row at line ${line} does not match ${options.contract.id}: ${detail}`,
                    problems[0]?.column ?? 'row',
                );
            }
            yield projected;
        }
    } catch (err) {
        throw toSourceError(err, filePath);
    } finally {
        input.destroy();
    }
}
