import { ExternalAPIError, ResponseParseError, errorMessage } from './errors';

const MAX_ERROR_BODY_LENGTH = 500;

export interface TimedRequestInit extends RequestInit {
    timeoutMs: number;
}

function isTimeoutError(error: unknown): boolean {
    return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

async function readErrorBody(response: Response): Promise<string> {
    try {
        const text = await response.text();
        return text.slice(0, MAX_ERROR_BODY_LENGTH);
    } catch {
        return '';
    }
}

/**
 * `fetch` with a hard timeout. Anything short of a 2xx answer surfaces as
 * ExternalAPIError; nothing is retried here.
 *
 * @param operation - Human label used in error messages, e.g. "Stock update".
 *   Never pass the URL: it may carry credentials.
 */
export async function fetchWithTimeout(
    service: string,
    operation: string,
    url: string,
    init: TimedRequestInit
): Promise<Response> {
    const { timeoutMs, ...requestInit } = init;

    let response: Response;
    try {
        response = await fetch(url, { ...requestInit, signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
        const message = isTimeoutError(error)
            ? `${operation} timed out after ${timeoutMs}ms`
            : `${operation} failed: ${errorMessage(error)}`;
        throw new ExternalAPIError(service, message, { cause: error });
    }

    if (!response.ok) {
        throw new ExternalAPIError(service, `${operation} returned HTTP ${response.status}`, {
            status: response.status,
            responseBody: await readErrorBody(response),
        });
    }

    return response;
}

/** Reads a JSON body; anything unreadable is a ResponseParseError. */
export async function readJson(service: string, operation: string, response: Response): Promise<unknown> {
    try {
        return await response.json();
    } catch (error) {
        if (isTimeoutError(error)) {
            throw new ExternalAPIError(service, `${operation} timed out while reading the response`, { cause: error });
        }
        throw new ResponseParseError(service, `${operation} returned a body that is not JSON`, { cause: error });
    }
}
