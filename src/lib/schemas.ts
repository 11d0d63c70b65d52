import Ajv from 'ajv/dist/2020';
import type { ErrorObject, SchemaObject } from 'ajv';
import addFormats from 'ajv-formats';
import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import type { Logger } from './logger';

export const HHS_ROW_SCHEMA_ID = 'https://hospital-capacity-etl.dev/contracts/hhs-capacity-row.json';
export const QUALITY_ROW_SCHEMA_ID = 'https://hospital-capacity-etl.dev/contracts/cms-quality-row.json';

export interface RowProblem {
    /** Source column the problem is about; `row` when it is about the row as a whole. */
    column: string;
    message: string;
}

/** Checks one raw row; returns its problems, or null when the row conforms. */
export interface RowContract {
    readonly id: string;
    check(row: unknown): RowProblem[] | null;
}

const isSchemaObject = (value: unknown): value is SchemaObject =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

// "/ZIP Code" -> "ZIP Code"
const columnOf = (instancePath: string): string =>
    instancePath ? instancePath.slice(1).replace(/~1/g, '/').replace(/~0/g, '~') : 'row';

const formatErrors = (errors: ErrorObject[]): RowProblem[] =>
    errors.map((e) => {
        if (e.keyword === 'required' && typeof e.params.missingProperty === 'string') {
            return { column: e.params.missingProperty, message: `missing column "${e.params.missingProperty}"` };
        }
        const column = columnOf(e.instancePath);
        return { column, message: `column "${column}" ${e.message ?? 'is invalid'}` };
    });

/**
 * Row contracts are JSON Schemas under the contracts directory, registered by `$id`.
 * Files with identical content are loaded once; a second file claiming an
 * already-registered `$id` is skipped.
 */
export class ContractRegistry {
    private readonly ajv = new Ajv({ strict: false, allErrors: true });
    private readonly loadedSchemaIds = new Set<string>();
    private readonly loadedSchemaHashes = new Set<string>();

    constructor(private readonly logger: Logger) {
        addFormats(this.ajv);
    }

    load(dir: string): this {
        this.loadRecursively(dir);
        return this;
    }

    has(schemaId: string): boolean {
        return this.loadedSchemaIds.has(schemaId);
    }

    contract(schemaId: string): RowContract {
        const validateFn = this.ajv.getSchema(schemaId);
        if (!validateFn) {
            throw new Error(`Schema ${schemaId} not found`);
        }
        return {
            id: schemaId,
            check: (row: unknown) => (validateFn(row) ? null : formatErrors(validateFn.errors ?? [])),
        };
    }

    private loadRecursively(dir: string): void {
        if (!fs.existsSync(dir)) {
            this.logger.warn({ dir }, 'Contracts directory not found');
            return;
        }
        const entries = fs.readdirSync(dir, { withFileTypes: true });
        for (const entry of entries) {
            const fullPath = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                this.loadRecursively(fullPath);
            } else if (entry.isFile() && entry.name.endsWith('.json')) {
                this.loadFile(fullPath);
            }
        }
    }

    private loadFile(fullPath: string): void {
        const content = fs.readFileSync(fullPath, 'utf-8');
        const hash = crypto.createHash('sha256').update(content).digest('hex');
        if (this.loadedSchemaHashes.has(hash)) return;

        const schema: unknown = JSON.parse(content);
        if (!isSchemaObject(schema) || typeof schema.$id !== 'string') {
            this.logger.warn({ file: fullPath }, 'Skipping schema without $id');
            return;
        }
        if (this.loadedSchemaIds.has(schema.$id)) {
            this.logger.warn({ id: schema.$id, file: fullPath }, 'Skipping duplicate schema ID');
            return;
        }

        this.ajv.addSchema(schema);
        this.loadedSchemaIds.add(schema.$id);
        this.loadedSchemaHashes.add(hash);
        this.logger.debug({ id: schema.$id }, 'Loaded schema');
    }
}
