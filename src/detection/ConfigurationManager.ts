import { EventEmitter } from 'events';
import {
    createDefaultDetectionConfig,
    type DetectionConfig,
    type DetectionRules,
    type ScannerSignature,
} from './types/Configuration.js';
import { isPlainObject } from './types/Fingerprint.js';
import { analysisErrorHandler } from './ErrorHandler.js';

/**
 * Configuration validation error
 */
export class ConfigurationError extends Error {
    constructor(message: string, public field?: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Partial update accepted by updateConfig; each section is merged shallowly
 */
export interface ConfigUpdate {
    server?: Partial<DetectionConfig['server']>;
    rules?: Partial<DetectionRules>;
    health?: Partial<DetectionConfig['health']>;
    logging?: Partial<DetectionConfig['logging']>;
}

type ConfigChanges = Record<string, { from: unknown; to: unknown }>;

const BODY_LIMIT_PATTERN = /^\d+(b|kb|mb|gb)?$/i;

function parseList(value: string): string[] {
    return value.split(',').map(item => item.trim()).filter(item => item.length > 0);
}

/**
 * Parses `pattern=Description` pairs separated by commas
 */
function parseScannerSignatures(value: string): ScannerSignature[] {
    return parseList(value).map(entry => {
        const separator = entry.indexOf('=');
        if (separator <= 0) {
            throw new ConfigurationError(
                `Scanner signature "${entry}" must look like pattern=Description`,
                'rules.scannerSignatures',
            );
        }
        return {
            pattern: entry.slice(0, separator).trim(),
            description: entry.slice(separator + 1).trim(),
        };
    });
}

/**
 * Configuration manager for the visitor analysis service.
 * Merges defaults with environment variables, validates, and emits
 * `configChanged` on runtime updates.
 */
export class ConfigurationManager extends EventEmitter {
    private config: DetectionConfig;

    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
        super();
        this.config = this.loadConfiguration();
    }

    /**
     * Get a copy of the current configuration
     */
    getConfig(): DetectionConfig {
        return structuredClone(this.config);
    }

    /**
     * Update configuration and emit change event
     */
    updateConfig(update: ConfigUpdate): void {
        const mergedConfig = this.mergeConfig(this.config, update);
        this.validateConfiguration(mergedConfig);

        const oldConfig = this.config;
        this.config = mergedConfig;

        console.info('Configuration updated', {
            changes: this.getConfigChanges(oldConfig, mergedConfig),
        });

        this.emit('configChanged', this.getConfig(), oldConfig);
    }

    /**
     * Load configuration from environment variables and defaults
     */
    private loadConfiguration(): DetectionConfig {
        const config = createDefaultDetectionConfig();

        try {
            this.loadFromEnvironment(config);
        } catch (error) {
            if (error instanceof ConfigurationError) {
                analysisErrorHandler.handleConfigurationError(error);
            }
            throw error;
        }

        this.validateConfiguration(config);
        return config;
    }

    /**
     * Load configuration values from environment variables
     */
    private loadFromEnvironment(config: DetectionConfig): void {
        const { env } = this;

        // Server
        if (env.PORT !== undefined) {
            config.server.port = parseInt(env.PORT, 10);
        }
        if (env.BODY_LIMIT !== undefined) {
            config.server.bodyLimit = env.BODY_LIMIT.trim();
        }

        // Logging
        if (env.DATA_DIR !== undefined) {
            config.logging.dataDir = env.DATA_DIR;
        }
        if (env.LOG_FILE_PATH !== undefined) {
            config.logging.logFilePath = env.LOG_FILE_PATH;
        }
        if (env.LOG_RETENTION_DAYS !== undefined) {
            config.logging.retentionDays = parseInt(env.LOG_RETENTION_DAYS, 10);
        }

        // Detection rules
        if (env.VERDICT_SENSITIVE_PATHS !== undefined) {
            config.rules.sensitivePaths = parseList(env.VERDICT_SENSITIVE_PATHS);
        }
        if (env.VERDICT_SCANNER_SIGNATURES !== undefined) {
            config.rules.scannerSignatures = parseScannerSignatures(env.VERDICT_SCANNER_SIGNATURES);
        }
        if (env.VERDICT_BOT_KEYWORDS !== undefined) {
            config.rules.botKeywords = parseList(env.VERDICT_BOT_KEYWORDS);
        }

        // Health
        if (env.VERDICT_HEALTH_FAILURE_THRESHOLD !== undefined) {
            config.health.failureThreshold = parseInt(env.VERDICT_HEALTH_FAILURE_THRESHOLD, 10);
        }
    }

    /**
     * Validate configuration values; counts and rethrows the first problem found
     */
    private validateConfiguration(config: DetectionConfig): void {
        try {
            this.checkConfiguration(config);
        } catch (error) {
            if (error instanceof ConfigurationError) {
                analysisErrorHandler.handleConfigurationError(error);
            }
            throw error;
        }
    }

    private checkConfiguration(config: DetectionConfig): void {
        const { port, bodyLimit } = config.server;
        if (!Number.isInteger(port) || port < 0 || port > 65535) {
            throw new ConfigurationError('Port must be an integer between 0 and 65535', 'server.port');
        }
        if (!BODY_LIMIT_PATTERN.test(bodyLimit)) {
            throw new ConfigurationError(`Body limit "${bodyLimit}" is not a valid size`, 'server.bodyLimit');
        }

        const { rules } = config;
        if (rules.standardHeaders.length === 0) {
            throw new ConfigurationError('At least one standard header must be specified', 'rules.standardHeaders');
        }
        if (rules.botKeywords.length === 0) {
            throw new ConfigurationError('At least one bot keyword must be specified', 'rules.botKeywords');
        }
        if (rules.browserTokens.length === 0) {
            throw new ConfigurationError('At least one browser token must be specified', 'rules.browserTokens');
        }
        if (rules.allowedMethods.length === 0) {
            throw new ConfigurationError('At least one allowed method must be specified', 'rules.allowedMethods');
        }
        if (rules.scannerSignatures.some(signature => !signature.pattern || !signature.description)) {
            throw new ConfigurationError('Scanner signatures need a pattern and a description', 'rules.scannerSignatures');
        }

        const { failureThreshold } = config.health;
        if (!Number.isInteger(failureThreshold) || failureThreshold < 0) {
            throw new ConfigurationError('Failure threshold must be a non-negative integer', 'health.failureThreshold');
        }

        const { dataDir, retentionDays } = config.logging;
        if (!dataDir) {
            throw new ConfigurationError('Data directory must not be empty', 'logging.dataDir');
        }
        if (!Number.isInteger(retentionDays) || retentionDays < 1) {
            throw new ConfigurationError('Log retention must be at least one day', 'logging.retentionDays');
        }
    }

    /**
     * Merge configuration objects
     */
    private mergeConfig(base: DetectionConfig, updates: ConfigUpdate): DetectionConfig {
        return {
            server: {
                ...base.server,
                ...updates.server,
            },
            rules: {
                ...base.rules,
                ...updates.rules,
            },
            health: {
                ...base.health,
                ...updates.health,
            },
            logging: {
                ...base.logging,
                ...updates.logging,
            },
        };
    }

    /**
     * Get configuration changes for logging
     */
    private getConfigChanges(oldConfig: DetectionConfig, newConfig: DetectionConfig): ConfigChanges {
        const changes: ConfigChanges = {};

        const compareValues = (old: unknown, updated: unknown, path: string) => {
            if (isPlainObject(updated)) {
                const previous: Record<string, unknown> = isPlainObject(old) ? old : {};
                for (const key of Object.keys(updated)) {
                    compareValues(previous[key], updated[key], path ? `${path}.${key}` : key);
                }
            } else if (JSON.stringify(old) !== JSON.stringify(updated)) {
                changes[path] = { from: old, to: updated };
            }
        };

        compareValues(oldConfig, newConfig, '');
        return changes;
    }

    /**
     * Cleanup resources
     */
    destroy(): void {
        this.removeAllListeners();
    }
}

// Singleton instance
let configManager: ConfigurationManager | null = null;

/**
 * Get the global configuration manager instance
 */
export function getConfigurationManager(): ConfigurationManager {
    if (!configManager) {
        configManager = new ConfigurationManager();
    }
    return configManager;
}

