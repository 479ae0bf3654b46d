import {
    BusinessRejectionError,
    ConfigurationError,
    ExternalAPIError,
    ResponseParseError,
    errorMessage,
} from '../../utils/errors';

export type SyncErrorCode =
    | 'CONNECTION'
    | 'TIMEOUT'
    | 'AUTH'
    | 'RATE_LIMIT'
    | 'REMOTE_ERROR'
    | 'REJECTED'
    | 'PARSE'
    | 'CONFIG'
    | 'UNKNOWN';

export interface SyncErrorInfo {
    code: SyncErrorCode;
    message: string;
    friendlyMessage: string;
}

function isTimeout(error: unknown): boolean {
    const cause = error instanceof Error ? error.cause : undefined;
    return [error, cause].some(e => e instanceof Error && (e.name === 'TimeoutError' || e.name === 'AbortError'));
}

function fromStatus(status: number): Omit<SyncErrorInfo, 'message'> | null {
    if (status === 401 || status === 403) {
        return { code: 'AUTH', friendlyMessage: 'Authentication failed. Check the access token or POS password.' };
    }
    if (status === 429) {
        return { code: 'RATE_LIMIT', friendlyMessage: 'Rate limit hit. Increase the pacing delays and run again.' };
    }
    if (status >= 500) {
        return { code: 'REMOTE_ERROR', friendlyMessage: 'The remote system is temporarily unavailable. Run again later.' };
    }
    return null;
}

function fromMessage(message: string): Omit<SyncErrorInfo, 'message'> {
    const text = message.toLowerCase();

    if (text.includes('econnrefused') || text.includes('enotfound') || text.includes('econnreset') || text.includes('socket hang up') || text.includes('fetch failed')) {
        return { code: 'CONNECTION', friendlyMessage: 'Could not reach the remote system. Check the store URL and connectivity.' };
    }
    if (text.includes('timeout') || text.includes('timed out') || text.includes('etimedout')) {
        return { code: 'TIMEOUT', friendlyMessage: 'The remote system did not answer in time.' };
    }
    if (text.includes('401') || text.includes('403') || text.includes('unauthorized') || text.includes('forbidden')) {
        return { code: 'AUTH', friendlyMessage: 'Authentication failed. Check the access token or POS password.' };
    }
    if (text.includes('429') || text.includes('too many requests') || text.includes('throttled')) {
        return { code: 'RATE_LIMIT', friendlyMessage: 'Rate limit hit. Increase the pacing delays and run again.' };
    }
    return { code: 'UNKNOWN', friendlyMessage: 'Sync failed. Check logs for details.' };
}

/**
 * Classifies anything thrown by a client call into a stable code plus a
 * message an operator can act on.
 */
export function mapSyncError(error: unknown): SyncErrorInfo {
    const message = errorMessage(error);

    if (error instanceof BusinessRejectionError) {
        return { code: 'REJECTED', message, friendlyMessage: 'The storefront refused the change.' };
    }
    if (error instanceof ResponseParseError) {
        return { code: 'PARSE', message, friendlyMessage: 'The remote system sent a response that could not be read.' };
    }
    if (error instanceof RangeError) {
        return { code: 'PARSE', message, friendlyMessage: 'A price was out of the range that can be written.' };
    }
    if (error instanceof ConfigurationError) {
        return { code: 'CONFIG', message, friendlyMessage: 'Configuration is incomplete. Check the environment variables.' };
    }
    if (isTimeout(error)) {
        return { code: 'TIMEOUT', message, friendlyMessage: 'The remote system did not answer in time.' };
    }
    if (error instanceof ExternalAPIError && error.status !== undefined) {
        const mapped = fromStatus(error.status);
        if (mapped) return { ...mapped, message };
        return { code: 'REMOTE_ERROR', message, friendlyMessage: `The remote system answered with HTTP ${error.status}.` };
    }

    const causeMessage = error instanceof Error && error.cause !== undefined ? ` ${errorMessage(error.cause)}` : '';
    return { ...fromMessage(message + causeMessage), message };
}
