import winston from 'winston';
import { randomUUID } from 'crypto';

const { combine, timestamp, printf, colorize, json } = winston.format;

const LOG_MODE: 'text' | 'json' = process.env.LOG_MODE === 'json' ? 'json' : 'text';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

/**
 * Logger metadata type
 */
export type LogMetadata = Record<string, unknown> | Error;

/**
 * Correlation ID store, one id per download in flight
 */
class CorrelationStore {
    private store: Map<string, string>;

    constructor() {
        this.store = new Map();
    }

    set(correlationId: string): void {
        this.store.set('current', correlationId);
    }

    get(): string | undefined {
        return this.store.get('current');
    }

    clear(): void {
        this.store.delete('current');
    }

    generate(): string {
        const id = randomUUID();
        this.set(id);
        return id;
    }
}

const correlationStore = new CorrelationStore();

/**
 * JSON format for structured logging
 */
const jsonFormat = combine(
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.errors({ stack: true }),
    winston.format((info) => {
        const correlationId = correlationStore.get();
        if (correlationId) {
            info.correlationId = correlationId;
        }
        return info;
    })(),
    json()
);

/**
 * Text format for human-readable console output
 */
const textFormat = printf(({ level, message, timestamp, context, correlationId, ...meta }: winston.Logform.TransformableInfo) => {
    const contextStr = context ? `[${String(context)}]` : '';
    const correlationStr = typeof correlationId === 'string' ? `[${correlationId.substring(0, 8)}]` : '';

    let log = `${String(timestamp)} ${level} ${contextStr}${correlationStr}: ${String(message)}`;

    const metaWithoutInternal: Record<string, unknown> = { ...meta };
    delete metaWithoutInternal.service;

    if (Object.keys(metaWithoutInternal).length > 0) {
        log += `\n${JSON.stringify(metaWithoutInternal, null, 2)}`;
    }

    return log;
});

/**
 * Console format with color
 */
const consoleFormat = combine(
    colorize({ all: true }),
    timestamp({ format: 'HH:mm:ss' }),
    winston.format((info) => {
        const correlationId = correlationStore.get();
        if (correlationId) {
            info.correlationId = correlationId;
        }
        return info;
    })(),
    textFormat
);

/**
 * Create Winston logger instance
 */
function createWinstonLogger(context: string): winston.Logger {
    return winston.createLogger({
        level: LOG_LEVEL,
        defaultMeta: {
            service: 'random-tree-faker',
            context
        },
        transports: [
            new winston.transports.Console({
                format: LOG_MODE === 'json' ? jsonFormat : consoleFormat
            })
        ]
    });
}

/**
 * Logger class with context support and correlation IDs
 */
export class Logger {
    public readonly context: string;
    public readonly logger: winston.Logger;

    constructor(context: string = 'faker') {
        this.context = context;
        this.logger = createWinstonLogger(context);
    }

    /**
     * Generate and set a new correlation ID
     */
    generateCorrelationId(): string {
        return correlationStore.generate();
    }

    clearCorrelationId(): void {
        correlationStore.clear();
    }

    error(message: string, metadata: LogMetadata = {}): void {
        this.logger.error(message, { ...this._buildMetadata(metadata), context: this.context });
    }

    warn(message: string, metadata: LogMetadata = {}): void {
        this.logger.warn(message, { ...this._buildMetadata(metadata), context: this.context });
    }

    info(message: string, metadata: LogMetadata = {}): void {
        this.logger.info(message, { ...this._buildMetadata(metadata), context: this.context });
    }

    debug(message: string, metadata: LogMetadata = {}): void {
        this.logger.debug(message, { ...this._buildMetadata(metadata), context: this.context });
    }

    /**
     * Measure the duration of an async operation
     */
    async measureAsync<T>(
        operation: () => Promise<T>,
        operationName: string
    ): Promise<T> {
        const start = Date.now();

        try {
            const result = await operation();
            this.info(`Operation completed: ${operationName}`, {
                duration: `${Date.now() - start}ms`
            });
            return result;
        } catch (error) {
            const err = error instanceof Error ? error : new Error(String(error));
            this.error(`Operation failed: ${operationName}`, {
                duration: `${Date.now() - start}ms`,
                error: err.message
            });
            throw error;
        }
    }

    private _buildMetadata(metadata: LogMetadata): Record<string, unknown> {
        if (metadata instanceof Error) {
            return {
                error: metadata.message,
                name: metadata.name,
                stack: metadata.stack
            };
        }

        return metadata;
    }
}

/**
 * Create a namespaced logger
 */
export function createLogger(context: string): Logger {
    return new Logger(context);
}

const defaultLogger = new Logger('faker');

export default defaultLogger;
