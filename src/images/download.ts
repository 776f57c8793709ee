import fetch, { type Response } from 'node-fetch';
import { ExternalServiceError } from '../utils/ErrorHandler.js';

export const DOWNLOAD_TIMEOUT_MS = 30000;

/**
 * GET a URL with a timeout
 */
export async function fetchUrl(url: string, headers: Record<string, string>): Promise<Response> {
    return await fetch(url, {
        signal: AbortSignal.timeout(DOWNLOAD_TIMEOUT_MS),
        headers
    });
}

/**
 * Throw an ExternalServiceError for a non-2xx response
 */
export function validateHttpResponse(service: string, response: Response): void {
    if (!response.ok) {
        throw new ExternalServiceError(service, `HTTP ${response.status}: ${response.statusText}`, response.status);
    }
}

/**
 * Download a URL into memory
 */
export async function downloadBuffer(service: string, url: string, headers: Record<string, string>): Promise<Buffer> {
    const response = await fetchUrl(url, headers);
    validateHttpResponse(service, response);
    return Buffer.from(await response.arrayBuffer());
}
