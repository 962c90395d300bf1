import log from 'electron-log/node';
import { SynthesisConfig } from './types';

const FILE_FORMAT = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {text}';
const SILENT = process.env.NODE_ENV === 'test';

// Nothing reaches disk until a log file is configured
log.transports.file.level = false;
log.transports.file.format = FILE_FORMAT;
log.transports.console.level = SILENT ? false : 'info';

/**
 * Category-prefixed logging on top of electron-log, plus a timer for the
 * pipeline's critical path.
 */
export class PerformanceLogger {
    /**
     * Apply the run's logging configuration (levels and optional log file).
     */
    static configure(logging: SynthesisConfig['logging']): void {
        log.transports.console.level = SILENT ? false : logging.level;

        const filePath = logging.filePath;
        if (filePath) {
            log.transports.file.resolvePathFn = () => filePath;
            log.transports.file.level = logging.level;
        } else {
            log.transports.file.level = false;
        }
    }

    static debug(category: string, message: string): void {
        log.debug(`[${category}] ${message}`);
    }

    /**
     * Log important events
     */
    static info(category: string, message: string): void {
        log.info(`[${category}] ${message}`);
    }

    /**
     * Log warnings, with optional structured context
     */
    static warn(category: string, message: string, data?: unknown): void {
        if (data === undefined) {
            log.warn(`[${category}] ${message}`);
        } else {
            log.warn(`[${category}] ${message}`, data);
        }
    }

    static error(category: string, message: string, error?: unknown): void {
        if (error === undefined) {
            log.error(`[${category}] ${message}`);
        } else {
            log.error(`[${category}] ${message}`, error);
        }
    }

    /**
     * Time a synchronous operation and log its duration at debug level.
     */
    static time<T>(category: string, operation: string, fn: () => T): T {
        const start = performance.now();
        try {
            return fn();
        } finally {
            const duration = performance.now() - start;
            log.debug(`[PERF] ${category}[${operation}] ${duration.toFixed(2)}ms`);
        }
    }
}
