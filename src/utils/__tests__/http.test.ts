import { describe, it, expect, vi, beforeEach } from 'vitest';
import { fetchWithTimeout, readJson } from '../http';
import { ExternalAPIError, ResponseParseError } from '../errors';

const fetchMock = vi.fn<typeof fetch>();

async function captureError(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    throw new Error('Expected the promise to reject');
}

describe('fetchWithTimeout', () => {
    beforeEach(() => {
        fetchMock.mockReset();
        vi.stubGlobal('fetch', fetchMock);
    });

    it('should return successful responses', async () => {
        const response = new Response('{}', { status: 200 });
        fetchMock.mockResolvedValueOnce(response);

        await expect(fetchWithTimeout('Shopify', 'Listing', 'https://test.example/a', { timeoutMs: 1_000 })).resolves.toBe(response);
    });

    it('should pass a timeout signal instead of the timeout option', async () => {
        fetchMock.mockResolvedValueOnce(new Response('{}'));

        await fetchWithTimeout('Shopify', 'Listing', 'https://test.example/a', { method: 'GET', timeoutMs: 1_000 });

        const [, init] = fetchMock.mock.calls[0];
        expect(init?.signal).toBeInstanceOf(AbortSignal);
        expect(init?.method).toBe('GET');
        expect(init).not.toHaveProperty('timeoutMs');
    });

    it('should wrap network failures', async () => {
        fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

        const error = await captureError(fetchWithTimeout('Shopify', 'Listing', 'https://test.example/a', { timeoutMs: 1_000 }));

        expect(error).toBeInstanceOf(ExternalAPIError);
        expect(error).toMatchObject({ message: 'Shopify: Listing failed: fetch failed', status: undefined });
    });

    it('should report timeouts', async () => {
        const timeout = new Error('The operation was aborted due to timeout');
        timeout.name = 'TimeoutError';
        fetchMock.mockRejectedValueOnce(timeout);

        const error = await captureError(fetchWithTimeout('POS', 'Inventory export', 'https://test.example/a', { timeoutMs: 60_000 }));

        expect(error).toBeInstanceOf(ExternalAPIError);
        expect(error).toMatchObject({ message: 'POS: Inventory export timed out after 60000ms' });
    });

    it('should turn non-2xx answers into errors carrying status and body', async () => {
        fetchMock.mockResolvedValueOnce(new Response('down for maintenance', { status: 503 }));

        const error = await captureError(fetchWithTimeout('Shopify', 'Listing', 'https://test.example/a', { timeoutMs: 1_000 }));

        expect(error).toBeInstanceOf(ExternalAPIError);
        expect(error).toMatchObject({
            message: 'Shopify: Listing returned HTTP 503',
            status: 503,
            responseBody: 'down for maintenance',
        });
    });

    it('should cap the stored error body', async () => {
        fetchMock.mockResolvedValueOnce(new Response('x'.repeat(2_000), { status: 500 }));

        const error = await captureError(fetchWithTimeout('Shopify', 'Listing', 'https://test.example/a', { timeoutMs: 1_000 }));

        expect(error).toBeInstanceOf(ExternalAPIError);
        expect(error instanceof ExternalAPIError ? error.responseBody?.length : 0).toBe(500);
    });
});

describe('readJson', () => {
    it('should parse JSON bodies', async () => {
        await expect(readJson('Shopify', 'Listing', new Response('{"products":[]}'))).resolves.toEqual({ products: [] });
    });

    it('should raise a parse error for other bodies', async () => {
        const error = await captureError(readJson('Shopify', 'Listing', new Response('<html>')));

        expect(error).toBeInstanceOf(ResponseParseError);
        expect(error).toMatchObject({ message: 'Shopify: Listing returned a body that is not JSON' });
    });
});
