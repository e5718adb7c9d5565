/**
 * Turns a model body into an HTTP response according to its content type.
 */

import { stringifyJson, type JsonValue } from '@json-echo/core';

const DEFAULT_CONTENT_TYPE = 'application/json';

const NULL_BODY_STATUSES = new Set([204, 205, 304]);

/**
 * Extracts the media type from a `Content-Type` value, lower-cased and
 * without parameters.
 */
export function mediaType(contentType: string): string {
    return contentType.split(';')[0].trim().toLowerCase();
}

function stringify(value: JsonValue): string {
    return typeof value === 'string' ? value : stringifyJson(value);
}

function encodeForm(body: JsonValue): string {
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        return stringify(body);
    }
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(body)) {
        params.append(key, stringify(value));
    }
    return params.toString();
}

/**
 * Serializes a body for a media type.
 *
 * - `application/x-www-form-urlencoded`: top-level object fields become form
 *   fields; nested values are JSON-encoded
 * - `text/plain`, `text/html`: string bodies as-is, anything else empty
 * - everything else: JSON
 */
export function serializeBody(type: string, body: JsonValue): string {
    switch (type) {
        case 'application/x-www-form-urlencoded':
            return encodeForm(body);
        case 'text/plain':
        case 'text/html':
            return typeof body === 'string' ? body : '';
        default:
            return stringifyJson(body);
    }
}

/**
 * Builds the response for a matched route.
 *
 * Route headers are applied over a default `Content-Type: application/json`.
 *
 * @param body - Response body
 * @param status - Status code, 200-599
 * @param headers - Headers declared on the route
 * @throws \{RangeError\} When the status cannot be sent as a final response
 */
export function renderResponse(
    body: JsonValue,
    status: number,
    headers: Readonly<Record<string, string>> = {},
): Response {
    if (status < 200 || status > 599) {
        throw new RangeError(
            `Status ${status} cannot be sent as a final response`,
        );
    }

    const responseHeaders = new Headers({ 'Content-Type': DEFAULT_CONTENT_TYPE });
    for (const [name, value] of Object.entries(headers)) {
        responseHeaders.set(name, value);
    }

    if (NULL_BODY_STATUSES.has(status)) {
        return new Response(null, { status, headers: responseHeaders });
    }

    const type = mediaType(responseHeaders.get('Content-Type') ?? DEFAULT_CONTENT_TYPE);
    return new Response(serializeBody(type, body), {
        status,
        headers: responseHeaders,
    });
}
