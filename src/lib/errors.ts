export type ErrorKind =
    | 'source'
    | 'validation'
    | 'integrity'
    | 'connection'
    | 'resolution'
    | 'transaction';

/**
 * Base for every error the pipeline raises on purpose. `kind` names the stage
 * that failed in the CLIs' closing log line.
 */
export abstract class PipelineError extends Error {
    abstract readonly kind: ErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

// Source: the input file is missing or is not delimited text.

export class SourceError extends PipelineError {
    readonly kind = 'source';
}

export class NotFoundError extends SourceError {
    constructor(readonly path: string) {
        super(`File not found: ${path}`);
    }
}

export class ParseError extends SourceError {
    constructor(message: string, readonly line?: number, options?: { cause?: unknown }) {
        super(line !== undefined ? `${message} (line ${line})` : message, options);
    }
}

// Validation: a field could not be turned into its canonical type.

export class ValidationError extends PipelineError {
    readonly kind = 'validation';

    constructor(message: string, readonly field: string) {
        super(message);
    }
}

export class InvalidDateError extends ValidationError {
    constructor(field: string, readonly value: string) {
        super(`Invalid date for ${field}: "${value}" (expected YYYY-MM-DD)`, field);
    }
}

// Database

export type IntegrityViolation = 'foreign_key' | 'unique' | 'not_null' | 'check' | 'data' | 'other';

export class IntegrityError extends PipelineError {
    readonly kind = 'integrity';

    constructor(
        message: string,
        readonly violation: IntegrityViolation,
        readonly code?: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }
}

export class ConnectionError extends PipelineError {
    readonly kind = 'connection';
}

/** The ordered lookup after a conflict-free insert came back short. */
export class ResolutionError extends PipelineError {
    readonly kind = 'resolution';

    constructor(readonly table: string, readonly expected: number, readonly received: number) {
        super(`Resolved ${received} of ${expected} ${table} keys`);
    }
}

export class TransactionStateError extends PipelineError {
    readonly kind = 'transaction';
}

export const isPipelineError = (err: unknown): err is PipelineError => err instanceof PipelineError;

/** Anything the pipeline did not raise itself is `unexpected`. */
export const errorKind = (err: unknown): ErrorKind | 'unexpected' => (isPipelineError(err) ? err.kind : 'unexpected');

export const describeError = (err: unknown): string =>
    typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string'
        ? err.message
        : String(err);
