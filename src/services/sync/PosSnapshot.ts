import { Logger, LogMethods } from '../../utils/logger';
import { normalizeSku } from '../../utils/sku';
import type { AuthoritativeSource } from '../pos';
import type { AuthoritativeItem, AuthoritativeSnapshot } from '../../types/reconciliation';
import { PosRecordSchema } from './schemas';

/** Cap on how many duplicate keys are written into a single log line. */
const MAX_LOGGED_DUPLICATES = 20;

/**
 * Keys POS export records by normalized SKU.
 *
 * Best effort: a record that is not an object, lacks ID/Qua/Price, or carries
 * values that do not parse is dropped on its own. For a duplicated key the
 * last record wins and the key is reported in `duplicateSkus`.
 */
export function indexAuthoritativeRecords(records: unknown[], log: LogMethods = Logger): AuthoritativeSnapshot {
    const items = new Map<string, AuthoritativeItem>();
    const duplicates = new Set<string>();
    let recordsDropped = 0;

    records.forEach((record, index) => {
        const parsed = PosRecordSchema.safeParse(record);
        if (!parsed.success) {
            recordsDropped++;
            log.debug('[PosSnapshot] Dropping malformed record', {
                index,
                errors: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).slice(0, 3),
            });
            return;
        }

        const normalizedSku = normalizeSku(parsed.data.ID);
        if (!normalizedSku) {
            recordsDropped++;
            log.debug('[PosSnapshot] Dropping record with an empty ID', { index });
            return;
        }

        if (items.has(normalizedSku)) {
            duplicates.add(normalizedSku);
        }

        items.set(normalizedSku, {
            normalizedSku,
            quantity: parsed.data.Qua,
            basePrice: parsed.data.Price,
        });
    });

    const duplicateSkus = [...duplicates];
    if (duplicateSkus.length > 0) {
        log.warn('[PosSnapshot] Duplicate SKUs in POS export, keeping the last record of each', {
            count: duplicateSkus.length,
            skus: duplicateSkus.slice(0, MAX_LOGGED_DUPLICATES),
        });
    }

    return {
        items,
        recordsReceived: records.length,
        recordsDropped,
        duplicateSkus,
    };
}

/**
 * Fetches the POS export and indexes it. Rejects only when the export call
 * itself fails or its body is not a list.
 */
export async function buildAuthoritativeSnapshot(
    source: AuthoritativeSource,
    log: LogMethods = Logger
): Promise<AuthoritativeSnapshot> {
    const records = await source.exportInventory();
    const snapshot = indexAuthoritativeRecords(records, log);

    log.info('[PosSnapshot] Loaded POS items', {
        items: snapshot.items.size,
        recordsReceived: snapshot.recordsReceived,
        recordsDropped: snapshot.recordsDropped,
        duplicates: snapshot.duplicateSkus.length,
    });

    return snapshot;
}
