import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // Asset pool
    assetCatalogPath: string;
    pixabayApiKey: string;
    placeholderAssetId: string;

    // Composition
    minAssetScore: number;
    candidateLimit: number;

    // Semantic analysis (optional, overrides rule-based profiling)
    semanticAnalysisEnabled: boolean;
    openaiApiKey: string;
    openaiModel: string;
    openaiBaseUrl: string;
    semanticAnalysisTimeoutMs: number;

    // Rendering (optional)
    renderEndpointUrl: string;
    renderApiKey: string;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarBoolean(key: string, defaultValue?: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return getEnvVar(key).toLowerCase() === 'true';
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),

        // Asset pool
        assetCatalogPath: getEnvVar('ASSET_CATALOG_PATH', './assets/asset_catalog.json'),
        pixabayApiKey: getEnvVar('PIXABAY_API_KEY', ''),
        placeholderAssetId: getEnvVar('PLACEHOLDER_ASSET_ID', ''),

        // Composition
        minAssetScore: getEnvVarNumber('MIN_ASSET_SCORE', 30),
        candidateLimit: getEnvVarNumber('CANDIDATE_LIMIT', 5),

        // Semantic analysis
        semanticAnalysisEnabled: getEnvVarBoolean('SEMANTIC_ANALYSIS_ENABLED', false),
        openaiApiKey: getEnvVar('OPENAI_API_KEY', ''),
        openaiModel: getEnvVar('OPENAI_MODEL', 'gpt-4o-mini'),
        openaiBaseUrl: getEnvVar('OPENAI_BASE_URL', 'https://api.openai.com'),
        semanticAnalysisTimeoutMs: getEnvVarNumber('SEMANTIC_ANALYSIS_TIMEOUT_MS', 5000),

        // Rendering
        renderEndpointUrl: getEnvVar('RENDER_ENDPOINT_URL', ''),
        renderApiKey: getEnvVar('RENDER_API_KEY', ''),
    };
}

/**
 * Checks value ranges and that enabled features have their credentials.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (config.minAssetScore < 0 || config.minAssetScore > 100) {
        errors.push('MIN_ASSET_SCORE must be between 0 and 100');
    }
    if (!Number.isInteger(config.candidateLimit) || config.candidateLimit < 1) {
        errors.push('CANDIDATE_LIMIT must be a positive integer');
    }
    if (config.semanticAnalysisTimeoutMs <= 0) {
        errors.push('SEMANTIC_ANALYSIS_TIMEOUT_MS must be positive');
    }
    if (config.semanticAnalysisEnabled && !config.openaiApiKey) {
        errors.push('OPENAI_API_KEY is required when SEMANTIC_ANALYSIS_ENABLED is true');
    }
    if (!config.assetCatalogPath && !config.pixabayApiKey) {
        errors.push('Either ASSET_CATALOG_PATH or PIXABAY_API_KEY must be set to provide assets');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
