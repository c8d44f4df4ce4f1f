/** Field name fragments whose string values never reach a log sink. */
export const SENSITIVE_FIELD_FRAGMENTS: readonly string[] = ['password', 'token', 'secret', 'key', 'auth'];

export const REDACTED = '***';

const fragments = SENSITIVE_FIELD_FRAGMENTS.join('|');

const fieldPattern = new RegExp(
    `"([^"]*(?:${fragments})[^"]*)"\\s*:\\s*"(?:[^"\\\\]|\\\\.)*"`,
    'gi'
);

// The same pair once more, as it appears inside an already serialized string: \"field\":\"value\"
const escapedFieldPattern = new RegExp(
    `\\\\"([^"\\\\]*(?:${fragments})[^"\\\\]*)\\\\"\\s*:\\s*\\\\"(?:[^"\\\\]|\\\\\\\\.)*?\\\\"`,
    'gi'
);

const invalidPasswordPattern = /invalid password:\s*[^\s"]*/gi;

/**
 * Replace the values of sensitive JSON fields in a piece of text.
 *
 * Works on serialized request/response bodies and error messages alike;
 * the text does not need to be valid JSON.
 */
export function redactSensitive(text: string): string {
    return text
        .replace(fieldPattern, (_match, field: string) => `"${field}":"${REDACTED}"`)
        .replace(escapedFieldPattern, (_match, field: string) => `\\"${field}\\":\\"${REDACTED}\\"`)
        .replace(invalidPasswordPattern, `invalid password: ${REDACTED}`);
}
