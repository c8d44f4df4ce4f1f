import { z } from 'zod';
import { API_VERSIONS } from '../dataplane/decoder';

const httpUrl = z.string().url().refine((v) => {
    try {
        const proto = new URL(v).protocol;
        return proto === 'http:' || proto === 'https:';
    } catch {
        return false;
    }
}, { message: 'url must be a valid http or https URL' });

export const RetrySettingsSchema = z.object({
    // Attempts per bundle operation, counting the first one
    maxAttempts: z.number().int().min(1).default(10),
    // Fixed pause between attempts
    delayMs: z.number().int().nonnegative().default(2000),
}).strict();

// Shape of dataplane.yml after environment overrides are applied
export const DataPlaneConfigSchema = z.object({
    // Base URL of the Data Plane API, without the version segment
    url: httpUrl,
    username: z.string().min(1),
    password: z.string().min(1),
    // Skip TLS certificate verification (self-signed lab setups)
    insecure: z.boolean().default(false),
    apiVersion: z.enum(API_VERSIONS).default('v3'),
    timeoutMs: z.number().int().positive().default(30_000),
    retry: RetrySettingsSchema.default({}),
}).strict();

export type DataPlaneConfig = z.infer<typeof DataPlaneConfigSchema>;
export type DataPlaneConfigInput = z.input<typeof DataPlaneConfigSchema>;
export type RetrySettings = z.infer<typeof RetrySettingsSchema>;

export function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => {
            const path = issue.path.length ? issue.path.join('.') : 'value';
            return `${path} ${issue.message}`;
        })
        .join('; ');
}
