/**
 * User-agent substring that identifies a known attack tool
 */
export interface ScannerSignature {
    /** Lower-case substring searched for in the user agent */
    pattern: string;
    /** Threat description reported when it matches */
    description: string;
}

/**
 * Heuristic lists the evidence analyzers match against
 */
export interface DetectionRules {
    /** Headers every mainstream browser sends */
    standardHeaders: string[];
    /** Header-value substrings left by automation tooling */
    automationHeaderSignatures: string[];
    /** User-agent substrings of bots, crawlers and HTTP libraries */
    botKeywords: string[];
    /** Tokens at least one of which a browser user agent carries */
    browserTokens: string[];
    /** Known scanner signatures, each a critical threat */
    scannerSignatures: ScannerSignature[];
    /** Path substrings that probe for sensitive resources */
    sensitivePaths: string[];
    /** Methods a regular visitor uses */
    allowedMethods: string[];
}

/**
 * Main configuration interface for the visitor analysis service
 */
export interface DetectionConfig {
    /** HTTP listener settings */
    server: {
        /** Port the service listens on */
        port: number;
        /** Maximum accepted JSON body, in body-parser notation (e.g. 100kb) */
        bodyLimit: string;
    };
    /** Heuristic lists used by the analyzers */
    rules: DetectionRules;
    /** Health reporting */
    health: {
        /** Analysis failures after which health reports degraded */
        failureThreshold: number;
    };
    /** Log file locations */
    logging: {
        /** Directory for the analysis event logs */
        dataDir: string;
        /** Application log the console is teed into; defaults to <dataDir>/app.log */
        logFilePath?: string;
        /** Days rotated application logs are kept */
        retentionDays: number;
    };
}

/**
 * Builds a fresh copy of the default configuration
 */
export function createDefaultDetectionConfig(): DetectionConfig {
    return {
        server: {
            port: 3000,
            bodyLimit: '100kb',
        },
        rules: {
            standardHeaders: [
                'User-Agent',
                'Accept',
                'Accept-Language',
                'Accept-Encoding',
                'Connection',
                'Upgrade-Insecure-Requests',
            ],
            automationHeaderSignatures: ['Selenium', 'PhantomJS', 'Headless', 'Python', 'curl', 'wget'],
            botKeywords: [
                'bot',
                'crawler',
                'spider',
                'scraper',
                'curl',
                'wget',
                'python',
                'java',
                'php',
                'ruby',
                'go-http',
                'postman',
                'insomnia',
            ],
            browserTokens: ['mozilla', 'chrome', 'safari', 'firefox', 'edge', 'opera'],
            scannerSignatures: [
                { pattern: 'sqlmap', description: 'SQL injection tool detected' },
                { pattern: 'nikto', description: 'Nikto scanner detected' },
            ],
            sensitivePaths: ['admin', 'wp-admin', 'phpmyadmin', '.env', 'config', 'backup'],
            allowedMethods: ['GET', 'POST'],
        },
        health: {
            failureThreshold: 100,
        },
        logging: {
            dataDir: 'data',
            retentionDays: 7,
        },
    };
}

/**
 * Default configuration values for the visitor analysis service
 */
export const DEFAULT_DETECTION_CONFIG: Readonly<DetectionConfig> = createDefaultDetectionConfig();
