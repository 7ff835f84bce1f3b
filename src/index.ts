#!/usr/bin/env node
import { config, parseIdList } from './config';
import { createClient, createExportManager, createImportManager, createStorage } from './context';
import { describeError, isFatal } from './errors';
import { hasFailures, summaryLines } from './services/ImportReport';
import { conflictStrategySchema } from './types';

const USAGE = `Usage:
  metabase-content-porter check
  metabase-content-porter export [--collections=1,2] [--include-archived] [--no-dashboards]
  metabase-content-porter import [--apply] [--conflict=skip|overwrite|rename] [--include-archived]`;

function option(args: string[], name: string): string | undefined {
    const arg = args.find(a => a.startsWith(`--${name}=`));
    return arg?.slice(name.length + 3);
}

async function main(): Promise<number> {
    const [command, ...args] = process.argv.slice(2);
    if (command === 'check') {
        let connected = true;
        for (const side of ['source', 'target'] as const) {
            const client = createClient(config, side);
            const ok = await client.validateConnection();
            console.log(`${ok ? '✅' : '✗'} ${side}: ${client.baseUrl}`);
            connected = connected && ok;
        }
        return connected ? 0 : 1;
    }

    const storage = createStorage(config);

    if (command === 'export') {
        const collections = option(args, 'collections');
        const manager = createExportManager(config, storage);
        const summary = await manager.run({
            exportDir: config.exportDir,
            rootCollectionIds: collections !== undefined ? parseIdList(collections) : config.rootCollectionIds,
            includeArchived: args.includes('--include-archived') || config.includeArchived,
            includeDashboards: !args.includes('--no-dashboards') && config.includeDashboards,
        });
        console.log(`\nExported ${summary.collections} collections, ${summary.cards} cards, ${summary.dashboards} dashboards`);
        for (const cycle of summary.cycles) console.warn(`⚠️  ${cycle}`);
        return summary.missing.length > 0 ? 1 : 0;
    }

    if (command === 'import') {
        const conflict = conflictStrategySchema.safeParse(option(args, 'conflict') ?? config.conflictStrategy);
        if (!conflict.success) {
            console.error(USAGE);
            return 1;
        }
        const manager = await createImportManager(config, storage);
        const report = await manager.run({
            dryRun: !args.includes('--apply'),
            conflict: conflict.data,
            includeArchived: args.includes('--include-archived') || config.includeArchived,
        });
        for (const line of summaryLines(report)) console.log(line);
        return hasFailures(report) ? 1 : 0;
    }

    console.error(USAGE);
    return 1;
}

main().then(
    code => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error(`${isFatal(error) ? 'Fatal' : 'Error'}: ${describeError(error)}`);
        process.exitCode = 2;
    }
);
