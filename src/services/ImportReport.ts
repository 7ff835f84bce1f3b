import path from 'path';
import fs from 'fs-extra';
import {
    MissingDependencyError,
    RemapError,
    UnmappedDatabaseError,
    UnmappedFieldError,
    UnmappedTableError,
    describeError
} from '../errors';
import type {
    ConflictStrategy,
    ImportReportData,
    ImportReportItem,
    ReportCounts,
    ReportEntityType,
    ReportStatus,
    UnmappedEntity
} from '../types';

const SUMMARY_KEYS: Record<ReportEntityType, keyof ImportReportData['summary']> = {
    collection: 'collections',
    card: 'cards',
    dashboard: 'dashboards',
};

function emptyCounts(): ReportCounts {
    return { created: 0, updated: 0, skipped: 0, failed: 0 };
}

/** The entity named by a failure, e.g. `table 12 (orders)`. */
export function identifierOf(error: unknown): string | undefined {
    if (error instanceof RemapError) {
        const cause = error.rootCause;
        const name = cause instanceof UnmappedTableError ? cause.sourceTableName
            : cause instanceof UnmappedFieldError ? `${cause.sourceTableName}.${cause.sourceFieldName}`
                : cause instanceof UnmappedDatabaseError ? cause.sourceDatabaseName
                    : null;
        return name ? `${error.kind} ${error.sourceId} (${name})` : `${error.kind} ${error.sourceId}`;
    }
    if (error instanceof MissingDependencyError) {
        return error.missing.map(id => `card ${id}`).join(', ');
    }
    if (error instanceof UnmappedTableError) return `table ${error.sourceTableId} (${error.sourceTableName})`;
    if (error instanceof UnmappedFieldError) return `field ${error.sourceFieldId} (${error.sourceFieldName})`;
    if (error instanceof UnmappedDatabaseError) return `database ${error.sourceDatabaseId}`;
    return undefined;
}

export class ImportReport {
    private items: ImportReportItem[] = [];
    private unmapped: UnmappedEntity[] = [];
    private cycles = new Set<string>();
    private readonly startedAt = new Date().toISOString();
    private finishedAt: string | null = null;

    constructor(
        readonly dryRun: boolean,
        readonly conflictStrategy: ConflictStrategy
    ) {}

    succeeded(
        entityType: ReportEntityType,
        status: Exclude<ReportStatus, 'failed'>,
        item: { sourceId: number; targetId: number; name: string },
        warnings: string[] = []
    ): void {
        this.items.push({ entityType, status, ...item, warnings });
        for (const warning of warnings) {
            console.warn(`  ⚠️  ${entityType} ${item.sourceId}: ${warning}`);
        }
    }

    failed(
        entityType: ReportEntityType,
        item: { sourceId: number; name: string },
        error: unknown,
        warnings: string[] = []
    ): void {
        const errorKind = error instanceof RemapError ? error.rootCause.name
            : error instanceof Error ? error.name
                : 'Error';
        const entry: ImportReportItem = {
            entityType,
            status: 'failed',
            sourceId: item.sourceId,
            targetId: null,
            name: item.name,
            errorKind,
            message: describeError(error),
            warnings,
        };
        const identifier = identifierOf(error);
        if (identifier !== undefined) entry.identifier = identifier;
        if (error instanceof RemapError) entry.path = error.path;

        this.items.push(entry);
        console.error(`  ✗ ${entityType} '${item.name}' (ID: ${item.sourceId}): ${entry.message}`);
    }

    /** Left out of the run on purpose, e.g. an archived card. */
    skipped(entityType: ReportEntityType, item: { sourceId: number; name: string }, reason: string): void {
        this.items.push({ entityType, status: 'skipped', sourceId: item.sourceId, targetId: null, name: item.name, reason, warnings: [] });
        console.log(`  - Skipped ${entityType} '${item.name}' (ID: ${item.sourceId}): ${reason}`);
    }

    setUnmapped(entities: UnmappedEntity[]): void {
        this.unmapped = [...entities];
    }

    addCycles(cycles: Iterable<string>): void {
        for (const cycle of cycles) this.cycles.add(cycle);
    }

    finish(): ImportReportData {
        this.finishedAt = new Date().toISOString();
        return this.toJSON();
    }

    statusOf(entityType: ReportEntityType, sourceId: number): ReportStatus | undefined {
        return this.items.find(i => i.entityType === entityType && i.sourceId === sourceId)?.status;
    }

    toJSON(): ImportReportData {
        const summary: ImportReportData['summary'] = {
            collections: emptyCounts(),
            cards: emptyCounts(),
            dashboards: emptyCounts(),
        };
        for (const item of this.items) {
            summary[SUMMARY_KEYS[item.entityType]][item.status]++;
        }
        return {
            dryRun: this.dryRun,
            conflictStrategy: this.conflictStrategy,
            startedAt: this.startedAt,
            finishedAt: this.finishedAt,
            summary,
            items: this.items.map(i => ({ ...i, warnings: [...i.warnings] })),
            unmapped: [...this.unmapped],
            cycles: Array.from(this.cycles),
        };
    }
}

export function hasFailures(data: ImportReportData): boolean {
    return data.items.some(i => i.status === 'failed');
}

export function summaryLines(data: ImportReportData): string[] {
    const lines = [`=== Import ${data.dryRun ? 'plan (dry run)' : 'report'} ===`];
    for (const [kind, counts] of Object.entries(data.summary)) {
        lines.push(`${kind.padEnd(12)} created ${counts.created}, updated ${counts.updated}, skipped ${counts.skipped}, failed ${counts.failed}`);
    }
    if (data.unmapped.length > 0) lines.push(`Unmapped metadata: ${data.unmapped.length}`);
    for (const cycle of data.cycles) lines.push(`Cycle: ${cycle}`);
    return lines;
}

export async function writeReport(data: ImportReportData, dir: string): Promise<string> {
    const stamp = data.startedAt.replace(/[:.]/g, '-');
    const reportPath = path.join(dir, `import_report_${stamp}.json`);
    await fs.ensureDir(dir);
    await fs.writeJson(reportPath, data, { spaces: 2 });
    return reportPath;
}
