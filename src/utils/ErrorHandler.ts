import logger from './logger.js';

/**
 * Base error type for the faker tools
 */
export class AppError extends Error {
    isOperational: boolean;
    timestamp: string;

    constructor(message: string, isOperational: boolean = true) {
        super(message);
        this.name = 'AppError';
        this.isOperational = isOperational;
        this.timestamp = new Date().toISOString();
        Error.captureStackTrace(this, this.constructor);
    }
}

export class ValidationError extends AppError {
    details: unknown;

    constructor(message: string, details: unknown = null) {
        super(message);
        this.name = 'ValidationError';
        this.details = details;
    }
}

export class ConfigurationError extends AppError {
    key: string;

    constructor(key: string, message: string) {
        super(`Invalid configuration ${key}: ${message}`);
        this.name = 'ConfigurationError';
        this.key = key;
    }
}

export class ExternalServiceError extends AppError {
    service: string;
    status: number | null;
    originalError: unknown;

    constructor(service: string, message: string, status: number | null = null, originalError: unknown = null) {
        super(`${service} error: ${message}`);
        this.name = 'ExternalServiceError';
        this.service = service;
        this.status = status;
        this.originalError = originalError;
    }
}

/**
 * Standardized error handler
 */
class ErrorHandler {
    /**
     * Central error handling logic
     * @param context - Additional context
     */
    handleError(error: unknown, context: Record<string, unknown> = {}): void {
        if (error instanceof AppError) {
            if (error.isOperational) {
                logger.warn('Operational error:', {
                    name: error.name,
                    message: error.message,
                    ...context
                });
            } else {
                logger.error('Programming error:', {
                    name: error.name,
                    message: error.message,
                    stack: error.stack,
                    ...context
                });
            }
        } else {
            const err = error instanceof Error ? error : new Error(String(error));
            logger.error('Unexpected error:', {
                message: err.message,
                stack: err.stack,
                ...context
            });
        }
    }

    /**
     * Validate and throw if invalid
     */
    validate(condition: boolean, message: string, details: unknown = null): void {
        if (!condition) {
            throw new ValidationError(message, details);
        }
    }

    /**
     * Retry operation with exponential backoff
     * @param maxAttempts - Total attempts, 1 means no retry
     * @param baseDelay - Base delay in ms
     */
    async retryWithBackoff<T>(operation: () => Promise<T>, maxAttempts: number = 3, baseDelay: number = 1000): Promise<T> {
        let lastError: unknown;

        for (let attempt = 0; attempt < maxAttempts; attempt++) {
            try {
                return await operation();
            } catch (error) {
                lastError = error;

                if (attempt < maxAttempts - 1) {
                    const delay = baseDelay * Math.pow(2, attempt);
                    logger.debug(`Retry attempt ${attempt + 1}/${maxAttempts} after ${delay}ms`);
                    await this._sleep(delay);
                }
            }
        }

        if (maxAttempts > 1) {
            logger.error(`Operation failed after ${maxAttempts} attempts`);
        }
        throw lastError;
    }

    /**
     * Log a fatal error from a CLI entry point and set the exit code
     */
    exitWithError(error: unknown): void {
        this.handleError(error);
        process.exitCode = 1;
    }

    private _sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}

export default new ErrorHandler();
