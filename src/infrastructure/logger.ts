// src/infrastructure/logger.ts
import { pino } from "pino";
import type { DestinationStream, Logger as PinoLogger } from "pino";
import type { ILogger, LogLevel } from "./loggerInterface.js";

export interface LoggerOptions {
    pretty?: boolean;
    level?: LogLevel;
    name?: string;
    /** Overrides stdout, mainly for tests */
    destination?: DestinationStream;
}

/**
 * Structured logger for the gamma blast pipeline
 */
export class Logger implements ILogger {
    private readonly correlationContext = new Map<string, string>();
    private readonly backend: PinoLogger;

    constructor(options: LoggerOptions = {}) {
        const pinoOptions = {
            name: options.name ?? "gamma-blast",
            level: options.level ?? "info",
            base: undefined,
            timestamp: pino.stdTimeFunctions.isoTime,
        };

        if (options.destination) {
            this.backend = pino(pinoOptions, options.destination);
        } else if (options.pretty) {
            this.backend = pino({
                ...pinoOptions,
                transport: { target: "pino-pretty" },
            });
        } else {
            this.backend = pino(pinoOptions);
        }
    }

    /**
     * Log info level message
     */
    public info(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("info", message, context, correlationId);
    }

    /**
     * Log error level message
     */
    public error(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("error", message, context, correlationId);
    }

    /**
     * Log warning level message
     */
    public warn(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("warn", message, context, correlationId);
    }

    /**
     * Log debug level message
     */
    public debug(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.log("debug", message, context, correlationId);
    }

    public isDebugEnabled(): boolean {
        return this.backend.isLevelEnabled("debug");
    }

    /**
     * Core logging method
     */
    private log(
        level: LogLevel,
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        const entry: Record<string, unknown> = { ...context };
        if (correlationId !== undefined) {
            entry["correlationId"] = correlationId;
            const scope = this.correlationContext.get(correlationId);
            if (scope !== undefined) {
                entry["correlationContext"] = scope;
            }
        }
        this.backend[level](entry, message);
    }

    /**
     * Set correlation context
     */
    public setCorrelationId(id: string, context: string): void {
        this.correlationContext.set(id, context);
    }

    /**
     * Remove correlation context
     */
    public removeCorrelationId(id: string): void {
        this.correlationContext.delete(id);
    }
}
