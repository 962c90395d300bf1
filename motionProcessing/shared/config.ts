import { SynthesisConfig, SkippedRowPolicy, LogLevel } from './types';
import { COMMA_CHAR, DOUBLEQUOTE_CHAR } from '../../shared/csv';
import {
    TRACKER_HEADERS,
    TIMESTAMP_HEADERS,
    OUTPUT_PREFIX_HEADERS,
    DEFAULT_OUTPUT_FILE,
    ENV_KEYS
} from './constants';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

const SKIPPED_ROW_POLICIES: readonly SkippedRowPolicy[] = [SkippedRowPolicy.OMIT, SkippedRowPolicy.PLACEHOLDER];

export interface SynthesisConfigOverrides {
    outputPath?: string;
    skippedRows?: SkippedRowPolicy;
    logLevel?: LogLevel;
    logFile?: string | null;
}

/**
 * Creates the synthesis configuration, applying any overrides on top of the reference layout.
 */
export function createSynthesisConfig(overrides: SynthesisConfigOverrides = {}): SynthesisConfig {
    const config: SynthesisConfig = {
        csv: {
            delimiter: COMMA_CHAR,
            quote: DOUBLEQUOTE_CHAR
        },
        trackerHeaders: TRACKER_HEADERS,
        timestampHeaders: TIMESTAMP_HEADERS,
        outputPrefixHeaders: OUTPUT_PREFIX_HEADERS,
        outputPath: overrides.outputPath ?? DEFAULT_OUTPUT_FILE,
        skippedRows: overrides.skippedRows ?? SkippedRowPolicy.OMIT,
        logging: {
            level: overrides.logLevel ?? 'info',
            filePath: overrides.logFile ?? null
        }
    };
    Object.freeze(config.csv);
    Object.freeze(config.logging);
    return Object.freeze(config);
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

function isSkippedRowPolicy(value: string): value is SkippedRowPolicy {
    return SKIPPED_ROW_POLICIES.some(policy => policy === value);
}

/**
 * Reads configuration overrides from environment variables.
 * Unset or empty variables are ignored; invalid values throw.
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv): SynthesisConfigOverrides {
    const overrides: SynthesisConfigOverrides = {};

    const output = env[ENV_KEYS.OUTPUT];
    if (output) {
        overrides.outputPath = output;
    }

    const skippedRows = env[ENV_KEYS.SKIPPED_ROWS];
    if (skippedRows) {
        if (!isSkippedRowPolicy(skippedRows)) {
            throw new Error(`${ENV_KEYS.SKIPPED_ROWS} must be one of ${SKIPPED_ROW_POLICIES.join(', ')}, got "${skippedRows}"`);
        }
        overrides.skippedRows = skippedRows;
    }

    const logLevel = env[ENV_KEYS.LOG_LEVEL];
    if (logLevel) {
        if (!isLogLevel(logLevel)) {
            throw new Error(`${ENV_KEYS.LOG_LEVEL} must be one of ${LOG_LEVELS.join(', ')}, got "${logLevel}"`);
        }
        overrides.logLevel = logLevel;
    }

    const logFile = env[ENV_KEYS.LOG_FILE];
    if (logFile) {
        overrides.logFile = logFile;
    }

    return overrides;
}
