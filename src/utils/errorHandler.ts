// src/utils/errorHandler.ts
import type { ILogger } from "../infrastructure/loggerInterface.js";

export interface ErrorContext {
    operation: string;
    component: string;
    correlationId?: string;
    metadata?: Record<string, unknown>;
}

export interface ErrorHandlerConfig {
    logger: ILogger;
    throwOnError?: boolean;
    logLevel?: "error" | "warn" | "info";
}

export class StandardError extends Error {
    constructor(
        message: string,
        public readonly context: ErrorContext,
        public readonly originalError?: Error
    ) {
        super(message);
        this.name = "StandardError";

        // Preserve stack trace from original error if available
        if (originalError?.stack) {
            this.stack = `${this.stack}\nCaused by: ${originalError.stack}`;
        }
    }
}

/**
 * Raised when an option chain cannot be condensed into a snapshot.
 */
export class ChainValidationError extends Error {
    constructor(
        message: string,
        public readonly symbol?: string
    ) {
        super(message);
        this.name = "ChainValidationError";
    }
}

export interface ComponentErrorHandler {
    handleSync<T>(
        operation: string,
        fn: () => T,
        metadata?: Record<string, unknown>,
        correlationId?: string
    ): T | null;
    handleAsync<T>(
        operation: string,
        fn: () => Promise<T>,
        metadata?: Record<string, unknown>,
        correlationId?: string
    ): Promise<T | null>;
}

export class ErrorHandler {
    /**
     * Standardized error handling wrapper for sync operations
     */
    public static handleError<T>(
        operation: () => T,
        context: ErrorContext,
        config: ErrorHandlerConfig
    ): T | null {
        try {
            return operation();
        } catch (error) {
            return this.processError(error, context, config);
        }
    }

    /**
     * Standardized error handling wrapper for async operations
     */
    public static async handleErrorAsync<T>(
        operation: () => Promise<T>,
        context: ErrorContext,
        config: ErrorHandlerConfig
    ): Promise<T | null> {
        try {
            return await operation();
        } catch (error) {
            return this.processError(error, context, config);
        }
    }

    private static processError(
        error: unknown,
        context: ErrorContext,
        config: ErrorHandlerConfig
    ): null {
        const errorMessage =
            error instanceof Error ? error.message : String(error);

        const logData = {
            operation: context.operation,
            component: context.component,
            error:
                error instanceof Error
                    ? {
                          name: error.name,
                          message: error.message,
                          stack: error.stack,
                      }
                    : error,
            ...context.metadata,
        };

        const logLevel = config.logLevel ?? "error";
        config.logger[logLevel](
            `[${context.component}] ${context.operation} failed`,
            logData,
            context.correlationId
        );

        if (config.throwOnError) {
            throw new StandardError(
                `${context.operation} failed: ${errorMessage}`,
                context,
                error instanceof Error ? error : undefined
            );
        }

        return null;
    }

    /**
     * Create a standardized error handler for a specific component
     */
    public static createComponentHandler(
        component: string,
        logger: ILogger
    ): ComponentErrorHandler {
        return {
            handleSync: <T>(
                operation: string,
                fn: () => T,
                metadata?: Record<string, unknown>,
                correlationId?: string
            ): T | null => {
                return this.handleError(
                    fn,
                    { operation, component, metadata, correlationId },
                    { logger, throwOnError: false }
                );
            },

            handleAsync: async <T>(
                operation: string,
                fn: () => Promise<T>,
                metadata?: Record<string, unknown>,
                correlationId?: string
            ): Promise<T | null> => {
                return this.handleErrorAsync(
                    fn,
                    { operation, component, metadata, correlationId },
                    { logger, throwOnError: false }
                );
            },
        };
    }
}
