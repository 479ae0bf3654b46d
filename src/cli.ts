import { writeFile } from 'fs/promises';
import { parseArgs } from 'util';
import { Logger } from './utils/logger';
import { ConfigurationError, errorMessage } from './utils/errors';
import { loadConfig, ReconcilerConfig } from './utils/env';
import { createReconciliation, EXIT_CODES, exitCodeFor } from './app';

export const USAGE = `Usage: catalog-reconciler [--dry-run] [--report <file>]

  --dry-run         read both catalogs and report, but write nothing to the storefront
  --report <file>   write the run report as JSON
  -h, --help        show this help`;

/**
 * One command-line run. Resolves to the process exit code; only failures
 * outside the reconciliation itself (such as an unwritable report file) reject.
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
    let values: { 'dry-run': boolean; report?: string; help: boolean };
    try {
        ({ values } = parseArgs({
            args: argv,
            options: {
                'dry-run': { type: 'boolean', default: false },
                report: { type: 'string' },
                help: { type: 'boolean', short: 'h', default: false },
            },
            strict: true,
        }));
    } catch (error) {
        Logger.error('Invalid arguments', { error: errorMessage(error) });
        console.error(USAGE);
        return EXIT_CODES.FAILED;
    }

    if (values.help) {
        console.log(USAGE);
        return EXIT_CODES.OK;
    }

    let config: Readonly<ReconcilerConfig>;
    try {
        // Only a flag that is present wins over DRY_RUN
        config = loadConfig(env, values['dry-run'] ? { dryRun: true } : {});
    } catch (error) {
        if (error instanceof ConfigurationError) {
            Logger.error('Configuration error', { error: error.message, variables: error.variables });
            return EXIT_CODES.FAILED;
        }
        throw error;
    }

    const report = await createReconciliation(config).perform();

    if (values.report) {
        await writeFile(values.report, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
        Logger.info('Report written', { file: values.report });
    }

    if (report.abortReason) {
        Logger.error(report.abortReason.friendlyMessage, {
            stage: report.abortReason.stage,
            code: report.abortReason.code,
            recoverable: report.abortReason.recoverable,
        });
    }

    return exitCodeFor(report);
}

/** `main` with every rejection logged and turned into a failure exit code. */
export async function run(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
    try {
        return await main(argv, env);
    } catch (error) {
        Logger.error('Reconciliation crashed', { error: errorMessage(error) });
        return EXIT_CODES.FAILED;
    }
}
