import fs from 'fs';
import yaml from 'js-yaml';
import isDocker from 'is-docker';
import { ConfigError, errorMessage } from './dataplane/errors';
import { DataPlaneConfig, DataPlaneConfigSchema, formatIssues } from './types/config';

// Configuration directory - use environment variable or sensible default
export const CONFIG_DIRECTORY = process.env.CONFIG_DIRECTORY || (isDocker() ? '/var/config/' : './config/');

export function getDefaultConfigFile(): string {
    return CONFIG_DIRECTORY + 'dataplane.yml';
}

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Overlay HAPROXY_* environment variables on a raw config object.
 * Unset or empty variables leave the file value alone.
 */
export function applyEnvOverrides(raw: Record<string, unknown>, env: Env = process.env): Record<string, unknown> {
    const merged: Record<string, unknown> = { ...raw };

    if (env.HAPROXY_URL) merged.url = env.HAPROXY_URL;
    if (env.HAPROXY_USERNAME) merged.username = env.HAPROXY_USERNAME;
    if (env.HAPROXY_PASSWORD) merged.password = env.HAPROXY_PASSWORD;
    if (env.HAPROXY_API_VERSION) merged.apiVersion = env.HAPROXY_API_VERSION;
    if (env.HAPROXY_INSECURE) {
        const value = env.HAPROXY_INSECURE.trim().toLowerCase();
        merged.insecure = value === 'true' || value === '1';
    }

    return merged;
}

/**
 * Validate an in-memory config object and fill in defaults.
 * Throws ConfigError with every zod issue joined into one reason.
 */
export function parseConfig(raw: unknown): DataPlaneConfig {
    const result = DataPlaneConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
    }
    return result.data;
}

/**
 * Load, override from the environment and validate a configuration file.
 */
export async function loadConfigFile(path?: string, env: Env = process.env): Promise<DataPlaneConfig> {
    const configPath = path || getDefaultConfigFile();
    try {
        const fileContent = await fs.promises.readFile(configPath, 'utf-8');
        const loaded: unknown = yaml.load(fileContent);
        // An empty file is allowed when the environment supplies everything
        const raw = loaded === undefined || loaded === null ? {} : loaded;
        if (!isRecord(raw)) {
            throw new ConfigError('config file must contain a mapping');
        }
        return parseConfig(applyEnvOverrides(raw, env));
    } catch (error) {
        throw new ConfigError(`Error loading config file at ${configPath}: ${errorMessage(error)}`, { cause: error });
    }
}
