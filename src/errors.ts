export enum MigrationErrorCode {
    UNMAPPED_DATABASE = 'UNMAPPED_DATABASE',
    UNMAPPED_TABLE = 'UNMAPPED_TABLE',
    UNMAPPED_FIELD = 'UNMAPPED_FIELD',
    REMAP_ERROR = 'REMAP_ERROR',
    MALFORMED_QUERY = 'MALFORMED_QUERY',
    CIRCULAR_DEPENDENCY = 'CIRCULAR_DEPENDENCY',
    DEPENDENCY_NOT_MIGRATED = 'DEPENDENCY_NOT_MIGRATED',
    REMOTE_TRANSIENT = 'REMOTE_TRANSIENT',
    REMOTE_PERMANENT = 'REMOTE_PERMANENT',
    RETRY_BUDGET_EXHAUSTED = 'RETRY_BUDGET_EXHAUSTED',
    MANIFEST_INTEGRITY = 'MANIFEST_INTEGRITY',
    UNKNOWN_ERROR = 'UNKNOWN_ERROR'
}

export type IdentifierKind = 'database' | 'table' | 'field' | 'card' | 'collection' | 'dashboard';

export class MigrationError extends Error {
    readonly code: MigrationErrorCode;

    constructor(code: MigrationErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }

    /** Errors that stop the whole run rather than one content item. */
    get fatal(): boolean {
        return false;
    }
}

export class UnmappedDatabaseError extends MigrationError {
    constructor(
        readonly sourceDatabaseId: number,
        readonly sourceDatabaseName: string | null,
        reason = 'no entry in by_id or by_name'
    ) {
        super(
            MigrationErrorCode.UNMAPPED_DATABASE,
            `Database ${sourceDatabaseName ? `${sourceDatabaseId} (${sourceDatabaseName})` : sourceDatabaseId} is not mapped: ${reason}`
        );
    }
}

export class UnmappedTableError extends MigrationError {
    constructor(
        readonly sourceTableId: number,
        readonly sourceTableName: string,
        readonly sourceDatabaseId: number,
        readonly targetDatabaseId: number
    ) {
        super(
            MigrationErrorCode.UNMAPPED_TABLE,
            `Table '${sourceTableName}' (ID: ${sourceTableId}) not found in target database ${targetDatabaseId}`
        );
    }
}

export class UnmappedFieldError extends MigrationError {
    constructor(
        readonly sourceFieldId: number,
        readonly sourceFieldName: string,
        readonly sourceTableName: string,
        readonly targetTableId: number
    ) {
        super(
            MigrationErrorCode.UNMAPPED_FIELD,
            `Field '${sourceTableName}.${sourceFieldName}' (ID: ${sourceFieldId}) not found in target table ${targetTableId}`
        );
    }
}

export class RemapError extends MigrationError {
    constructor(
        readonly path: string,
        readonly kind: IdentifierKind,
        readonly sourceId: number,
        cause?: MigrationError
    ) {
        super(
            MigrationErrorCode.REMAP_ERROR,
            `Cannot remap ${kind} ${sourceId} at ${path}${cause ? `: ${cause.message}` : ''}`,
            { cause }
        );
    }

    /** The mapping miss behind this failure, when the mapper recorded one. */
    get rootCause(): MigrationError {
        return this.cause instanceof MigrationError ? this.cause : this;
    }
}

export class MalformedQueryError extends MigrationError {
    constructor(readonly path: string, detail: string) {
        super(MigrationErrorCode.MALFORMED_QUERY, `Malformed query at ${path}: ${detail}`);
    }
}

export class CircularDependencyError extends MigrationError {
    constructor(readonly cycle: number[]) {
        super(MigrationErrorCode.CIRCULAR_DEPENDENCY, `Circular dependency detected: ${cycle.join(' → ')}`);
    }
}

export class MissingDependencyError extends MigrationError {
    constructor(readonly cardId: number, readonly missing: number[], reason = 'missing from the export') {
        super(
            MigrationErrorCode.DEPENDENCY_NOT_MIGRATED,
            `Card ${cardId} depends on cards ${reason}: ${missing.join(', ')}`
        );
    }
}

export class RemoteTransientError extends MigrationError {
    constructor(message: string, readonly status: number | null, cause?: unknown) {
        super(MigrationErrorCode.REMOTE_TRANSIENT, message, { cause });
    }
}

export class RemotePermanentError extends MigrationError {
    constructor(message: string, readonly status: number | null, cause?: unknown) {
        super(MigrationErrorCode.REMOTE_PERMANENT, message, { cause });
    }
}

export class RetryBudgetExhaustedError extends MigrationError {
    constructor(readonly budget: number, cause?: unknown) {
        super(MigrationErrorCode.RETRY_BUDGET_EXHAUSTED, `Retry budget of ${budget} exhausted`, { cause });
    }

    get fatal(): boolean {
        return true;
    }
}

export class ManifestIntegrityError extends MigrationError {
    constructor(readonly file: string, readonly expected: string, readonly actual: string) {
        super(
            MigrationErrorCode.MANIFEST_INTEGRITY,
            `Checksum mismatch for ${file}: expected ${expected}, got ${actual}`
        );
    }

    get fatal(): boolean {
        return true;
    }
}

export function isFatal(error: unknown): boolean {
    return error instanceof MigrationError && error.fatal;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
