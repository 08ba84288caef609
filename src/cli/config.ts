/**
 * CLI Configuration
 */

function getEnvString(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
}

/**
 * Get the context intelligence API base URL
 * Defaults to http://localhost:3300 if not set
 */
export function getApiUrl(): string {
    return getEnvString('CTXI_API_URL', 'http://localhost:3300');
}
