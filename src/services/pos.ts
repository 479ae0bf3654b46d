import { Logger } from '../utils/logger';
import { ResponseParseError } from '../utils/errors';
import { fetchWithTimeout, readJson } from '../utils/http';
import type { PosConfig } from '../utils/env';
import { PosExportSchema } from './sync/schemas';

const SERVICE = 'POS';

/** Bulk export of the authoritative catalog, one call, no pagination. */
export interface AuthoritativeSource {
    /** Raw export records; individual records are validated by the caller. */
    exportInventory(): Promise<unknown[]>;
}

/**
 * Point-of-sale bulk export client.
 *
 * The export endpoint authenticates with the shared password as a query
 * parameter, so the request URL is never logged.
 */
export class PosService implements AuthoritativeSource {
    constructor(private readonly config: PosConfig) { }

    buildExportUrl(): string {
        const url = new URL(this.config.baseUrl);
        url.searchParams.set('ps', this.config.password);
        url.searchParams.set('get', 'all');
        url.searchParams.set('output', 'json');
        url.searchParams.set('sep', ';');
        return url.toString();
    }

    async exportInventory(): Promise<unknown[]> {
        Logger.info('[POS] Fetching full inventory export', { timeoutMs: this.config.timeoutMs });

        const response = await fetchWithTimeout(SERVICE, 'Inventory export', this.buildExportUrl(), {
            headers: { Accept: 'application/json' },
            timeoutMs: this.config.timeoutMs,
        });

        const parsed = PosExportSchema.safeParse(await readJson(SERVICE, 'Inventory export', response));
        if (!parsed.success) {
            throw new ResponseParseError(SERVICE, 'Inventory export is not a list of records');
        }

        return parsed.data;
    }
}
