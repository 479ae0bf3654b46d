import { describe, it, expect, vi, beforeEach } from 'vitest';
import { writeFile } from 'fs/promises';
import { main, run, USAGE } from '../cli';
import { createReconciliation } from '../app';
import { ReconciliationSync } from '../services/sync/ReconciliationSync';
import { RequestPacer } from '../utils/requestPacer';
import type { ReconciliationReport, ReconciliationSummary } from '../types/reconciliation';

const log = vi.hoisted(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
}));

vi.mock('../utils/logger', () => ({
    Logger: { ...log, child: vi.fn(() => log) },
}));

vi.mock('fs/promises', () => ({
    writeFile: vi.fn(),
}));

vi.mock('../app', async (importOriginal) => {
    const actual = await importOriginal<typeof import('../app')>();
    return { ...actual, createReconciliation: vi.fn() };
});

const env = {
    SHOPIFY_STORE: 'test-shop.myshopify.com',
    SHOPIFY_TOKEN: 'test-token',
    LOCATION_ID: '555',
    POS_BASE_URL: 'https://pos.example.test/export',
    POS_PASSWORD: 'test-secret',
};

const zeroSummary: ReconciliationSummary = {
    total: 0,
    matched: 0,
    unmatched: 0,
    stockSynced: 0,
    stockFailed: 0,
    priceUpdated: 0,
    priceSkippedDiscount: 0,
    priceSkippedAtTarget: 0,
    priceInvalid: 0,
    priceFailed: 0,
    failuresRecoverable: 0,
};

function reportWith(fields: Partial<ReconciliationReport> = {}): ReconciliationReport {
    return {
        syncId: 'abcd1234',
        status: 'completed',
        dryRun: false,
        startedAt: '2026-01-01T00:00:00.000Z',
        finishedAt: '2026-01-01T00:00:02.000Z',
        durationMs: 2000,
        storefrontItems: 0,
        authoritativeItems: 1,
        duplicateSkus: [],
        outcomes: [],
        summary: zeroSummary,
        ...fields,
    };
}

/** A reconciliation whose run resolves to (or rejects with) the given value. */
function reconciliationResolving(result: ReconciliationReport | Error): ReconciliationSync {
    const sync = new ReconciliationSync({
        listing: { firstPageUrl: () => 'https://test-shop.myshopify.com/products.json', getProductsPage: vi.fn() },
        authoritative: { exportInventory: vi.fn() },
        writer: { setOnHandQuantity: vi.fn(), updateVariantPrice: vi.fn() },
        itemPacer: new RequestPacer(0),
    });
    if (result instanceof Error) {
        vi.spyOn(sync, 'perform').mockRejectedValue(result);
    } else {
        vi.spyOn(sync, 'perform').mockResolvedValue(result);
    }
    return sync;
}

function configPassedToReconciliation() {
    return vi.mocked(createReconciliation).mock.calls[0][0];
}

describe('main', () => {
    beforeEach(() => {
        vi.clearAllMocks();
        vi.mocked(createReconciliation).mockReturnValue(reconciliationResolving(reportWith()));
    });

    it('should print usage for --help without running', async () => {
        const print = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        await expect(main(['--help'], env)).resolves.toBe(0);

        expect(print).toHaveBeenCalledWith(USAGE);
        expect(createReconciliation).not.toHaveBeenCalled();
        print.mockRestore();
    });

    it('should fail on an unknown flag', async () => {
        const print = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        await expect(main(['--force'], env)).resolves.toBe(1);

        expect(log.error).toHaveBeenCalledWith('Invalid arguments', { error: expect.any(String) });
        expect(print).toHaveBeenCalledWith(USAGE);
        expect(createReconciliation).not.toHaveBeenCalled();
        print.mockRestore();
    });

    it('should fail with the missing variables on a configuration error', async () => {
        await expect(main([], { SHOPIFY_STORE: 'test-shop.myshopify.com', LOCATION_ID: '555' })).resolves.toBe(1);

        expect(log.error).toHaveBeenCalledWith('Configuration error', {
            error: 'Missing required environment variables: SHOPIFY_TOKEN, POS_BASE_URL, POS_PASSWORD',
            variables: ['SHOPIFY_TOKEN', 'POS_BASE_URL', 'POS_PASSWORD'],
        });
        expect(createReconciliation).not.toHaveBeenCalled();
    });

    it('should let --dry-run win over DRY_RUN=false', async () => {
        await main(['--dry-run'], { ...env, DRY_RUN: 'false' });

        expect(configPassedToReconciliation().dryRun).toBe(true);
    });

    it('should take DRY_RUN from the environment without the flag', async () => {
        await main([], { ...env, DRY_RUN: 'true' });
        await main([], env);

        expect(vi.mocked(createReconciliation).mock.calls.map(([config]) => config.dryRun)).toEqual([true, false]);
    });

    it('should write the report as JSON when asked', async () => {
        const report = reportWith();
        vi.mocked(createReconciliation).mockReturnValue(reconciliationResolving(report));

        await expect(main(['--report', 'out/report.json'], env)).resolves.toBe(0);

        expect(writeFile).toHaveBeenCalledWith('out/report.json', `${JSON.stringify(report, null, 2)}\n`, 'utf8');
        expect(log.info).toHaveBeenCalledWith('Report written', { file: 'out/report.json' });
    });

    it('should not write a report by default', async () => {
        await main([], env);

        expect(writeFile).not.toHaveBeenCalled();
    });

    it('should exit with 2 when items had problems', async () => {
        vi.mocked(createReconciliation).mockReturnValue(
            reconciliationResolving(reportWith({ summary: { ...zeroSummary, total: 1, matched: 1, stockFailed: 1 } }))
        );

        await expect(main([], env)).resolves.toBe(2);
    });

    it('should log the abort reason and exit with 1 on an aborted run', async () => {
        vi.mocked(createReconciliation).mockReturnValue(reconciliationResolving(reportWith({
            status: 'aborted',
            abortReason: {
                stage: 'authoritative_snapshot',
                code: 'AUTH',
                message: 'POS: Inventory export returned HTTP 401',
                friendlyMessage: 'Authentication failed. Check the access token or POS password.',
                recoverable: true,
                service: 'POS',
            },
        })));

        await expect(main([], env)).resolves.toBe(1);

        expect(log.error).toHaveBeenCalledWith('Authentication failed. Check the access token or POS password.', {
            stage: 'authoritative_snapshot',
            code: 'AUTH',
            recoverable: true,
        });
    });
});

describe('run', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('should return the exit code of a normal run', async () => {
        vi.mocked(createReconciliation).mockReturnValue(reconciliationResolving(reportWith()));

        await expect(run([], env)).resolves.toBe(0);
    });

    it('should turn a crash into exit code 1', async () => {
        vi.mocked(createReconciliation).mockReturnValue(reconciliationResolving(new Error('out of memory')));

        await expect(run([], env)).resolves.toBe(1);

        expect(log.error).toHaveBeenCalledWith('Reconciliation crashed', { error: 'out of memory' });
    });

    it('should turn an unwritable report file into exit code 1', async () => {
        vi.mocked(createReconciliation).mockReturnValue(reconciliationResolving(reportWith()));
        vi.mocked(writeFile).mockRejectedValueOnce(new Error('EACCES: permission denied'));

        await expect(run(['--report', '/report.json'], env)).resolves.toBe(1);

        expect(log.error).toHaveBeenCalledWith('Reconciliation crashed', { error: 'EACCES: permission denied' });
    });
});
