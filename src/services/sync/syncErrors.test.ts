import { describe, it, expect } from 'vitest';
import { mapSyncError } from './syncErrors';
import {
    BusinessRejectionError,
    ConfigurationError,
    ExternalAPIError,
    ResponseParseError,
} from '../../utils/errors';

describe('mapSyncError', () => {
    it('should map business rejections', () => {
        const info = mapSyncError(new BusinessRejectionError('Shopify', ['Price too low']));

        expect(info.code).toBe('REJECTED');
        expect(info.message).toBe('Shopify rejected the change: Price too low');
    });

    it('should map unreadable responses', () => {
        expect(mapSyncError(new ResponseParseError('POS', 'Inventory export is not a list of records')).code).toBe('PARSE');
    });

    it('should map out-of-range prices to PARSE', () => {
        expect(mapSyncError(new RangeError('Target price for base 1e+400 is out of range'))).toEqual({
            code: 'PARSE',
            message: 'Target price for base 1e+400 is out of range',
            friendlyMessage: 'A price was out of the range that can be written.',
        });
    });

    it('should map configuration errors', () => {
        expect(mapSyncError(new ConfigurationError('Missing required environment variables: SHOPIFY_TOKEN')).code).toBe('CONFIG');
    });

    it('should detect timeouts from the wrapped cause', () => {
        const cause = new Error('The operation was aborted due to timeout');
        cause.name = 'TimeoutError';

        expect(mapSyncError(new ExternalAPIError('Shopify', 'Listing timed out after 30000ms', { cause })).code).toBe('TIMEOUT');
    });

    it.each<[number, string]>([
        [401, 'AUTH'],
        [403, 'AUTH'],
        [429, 'RATE_LIMIT'],
        [500, 'REMOTE_ERROR'],
        [502, 'REMOTE_ERROR'],
    ])('should map HTTP %d to %s', (status, code) => {
        expect(mapSyncError(new ExternalAPIError('Shopify', `Listing returned HTTP ${status}`, { status })).code).toBe(code);
    });

    it('should name other HTTP statuses in the friendly message', () => {
        const info = mapSyncError(new ExternalAPIError('Shopify', 'Listing returned HTTP 404', { status: 404 }));

        expect(info).toEqual({
            code: 'REMOTE_ERROR',
            message: 'Shopify: Listing returned HTTP 404',
            friendlyMessage: 'The remote system answered with HTTP 404.',
        });
    });

    it('should look at the cause for connection failures', () => {
        const error = new ExternalAPIError('Shopify', 'Listing failed: fetch failed', {
            cause: new Error('getaddrinfo ENOTFOUND test-shop.myshopify.com'),
        });

        expect(mapSyncError(error).code).toBe('CONNECTION');
    });

    it('should classify plain errors by their message', () => {
        expect(mapSyncError(new Error('socket hang up')).code).toBe('CONNECTION');
        expect(mapSyncError(new Error('connect ETIMEDOUT 10.0.0.1:443')).code).toBe('TIMEOUT');
        expect(mapSyncError(new Error('Request failed: Unauthorized')).code).toBe('AUTH');
        expect(mapSyncError(new ExternalAPIError('Shopify', 'Stock update GraphQL error: Throttled')).code).toBe('RATE_LIMIT');
    });

    it('should fall back to UNKNOWN', () => {
        expect(mapSyncError('something odd')).toMatchObject({ code: 'UNKNOWN', message: 'something odd' });
        expect(mapSyncError(42)).toMatchObject({ code: 'UNKNOWN', message: 'Unknown error' });
    });
});
