import { DEFAULT_API_BASE, DEFAULT_API_VERSION } from '../config';

export const API_VERSION_HEADER = 'X-ShipStream-API-Version';
export const AUTH_HEADER = 'X-AutomationV1-Auth';

// The API expects the literal `filter[]=unique_id:<id>` form, so the query is built by hand
// rather than through URLSearchParams, which would percent-encode the brackets and colon.
export function buildQuery(
    identifier: string,
    expandOrder: boolean,
    baseUrl: string = DEFAULT_API_BASE,
): string {
    const uniqueId = identifier.trim();
    const url = `${baseUrl}?filter[]=unique_id:${uniqueId}`;
    return expandOrder ? `${url}&expand=order` : url;
}

/** Callers must reject an empty token before getting here. */
export function buildHeaders(
    authToken: string,
    apiVersion: string = DEFAULT_API_VERSION,
): Record<string, string> {
    return {
        'Content-Type': 'application/json',
        [API_VERSION_HEADER]: apiVersion,
        [AUTH_HEADER]: authToken.trim(),
    };
}
