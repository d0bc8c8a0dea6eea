// src/services/gammaBlastScanner.ts
/**********************************************************************
 * GammaBlastScanner - runs the detector for each tracked symbol.
 * Resolves the active expiry (read-through cache), pulls the recent
 * history, evaluates, and emits `"signal"` and `"signal:{symbol}"`
 * EventEmitter events with the ScanResult.
 *********************************************************************/

import { EventEmitter } from "events";
import { ulid } from "ulid";
import type { ScannerConfig } from "../core/config.js";
import type { IGammaBlastDetector } from "../indicators/interfaces/detectorInterfaces.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { ISnapshotHistoryProvider } from "../storage/snapshotHistoryStore.js";
import type {
    DetectionMode,
    GammaBlastSignal,
    MarketSnapshot,
} from "../types/snapshotTypes.js";
import {
    ErrorHandler,
    type ComponentErrorHandler,
} from "../utils/errorHandler.js";
import type { TimeAwareCache } from "../utils/timeAwareCache.js";

/**
 * Maps a symbol to the expiry whose chain is being tracked.
 */
export interface IExpiryResolver {
    resolveExpiry(symbol: string): Promise<string>;
}

export interface ScanResult {
    scanId: string;
    symbol: string;
    expiry: string;
    timestamp: number;
    mode: DetectionMode;
    historyLength: number;
    signal: GammaBlastSignal;
}

export interface GammaBlastScannerDependencies {
    detector: IGammaBlastDetector;
    historyProvider: ISnapshotHistoryProvider;
    expiryResolver: IExpiryResolver;
    expiryCache: TimeAwareCache<string, string>;
    logger: ILogger;
    config: ScannerConfig;
    /** Clock for result ageing (default: Date.now) */
    now?: () => number;
}

export class GammaBlastScanner extends EventEmitter {
    private readonly detector: IGammaBlastDetector;
    private readonly historyProvider: ISnapshotHistoryProvider;
    private readonly expiryResolver: IExpiryResolver;
    private readonly expiryCache: TimeAwareCache<string, string>;
    private readonly logger: ILogger;
    private readonly config: ScannerConfig;
    private readonly errors: ComponentErrorHandler;
    private readonly now: () => number;

    private readonly latest = new Map<string, ScanResult>();

    constructor(deps: GammaBlastScannerDependencies) {
        super();
        this.detector = deps.detector;
        this.historyProvider = deps.historyProvider;
        this.expiryResolver = deps.expiryResolver;
        this.expiryCache = deps.expiryCache;
        this.logger = deps.logger;
        this.config = deps.config;
        this.now = deps.now ?? Date.now;
        this.errors = ErrorHandler.createComponentHandler(
            "GammaBlastScanner",
            deps.logger
        );
    }

    /**
     * Evaluate one symbol against its stored history. The current snapshot
     * must not already be part of that history. Returns null when the
     * expiry or history lookup failed; the failure is logged.
     */
    public async scanSymbol(
        symbol: string,
        current: MarketSnapshot
    ): Promise<ScanResult | null> {
        const scanId = ulid();
        this.logger.setCorrelationId(scanId, `scan:${symbol}`);

        try {
            const result = await this.errors.handleAsync(
                "scanSymbol",
                async () => {
                    const expiry = await this.expiryCache.getOrLoad(
                        symbol,
                        (key) => this.expiryResolver.resolveExpiry(key)
                    );
                    const history =
                        await this.historyProvider.getRecentSnapshots(
                            symbol,
                            expiry,
                            this.config.historyLimit
                        );
                    const evaluation = this.detector.evaluate(
                        current,
                        history
                    );

                    return {
                        scanId,
                        symbol,
                        expiry,
                        timestamp: current.timestamp,
                        mode: evaluation.mode,
                        historyLength: evaluation.historyLength,
                        signal: evaluation.signal,
                    };
                },
                { symbol },
                scanId
            );

            if (result !== null) {
                // A failing listener must not fail the scan
                this.errors.handleSync(
                    "publish",
                    () => this.publish(result),
                    { symbol },
                    scanId
                );
            }
            return result;
        } finally {
            this.logger.removeCorrelationId(scanId);
        }
    }

    /**
     * Scan every symbol present in `currents`. Failures are isolated per
     * symbol; successful results keep input order.
     */
    public async scanAll(
        currents: ReadonlyMap<string, MarketSnapshot>
    ): Promise<ScanResult[]> {
        const results: ScanResult[] = [];
        for (const [symbol, snapshot] of currents) {
            const result = await this.scanSymbol(symbol, snapshot);
            if (result !== null) results.push(result);
        }

        this.logger.info("Scan cycle completed", {
            requested: currents.size,
            succeeded: results.length,
            alerts: results.filter(
                (r) => r.signal.probability > this.config.topBlastMinProbability
            ).length,
        });
        return results;
    }

    /**
     * Latest result per symbol above the alert threshold and no older than
     * `topBlastMaxAgeMs`, most probable first.
     */
    public getTopBlasts(limit: number = 10): ScanResult[] {
        const now = this.now();
        return [...this.latest.values()]
            .filter(
                (r) =>
                    now - r.timestamp <= this.config.topBlastMaxAgeMs &&
                    r.signal.probability > this.config.topBlastMinProbability
            )
            .sort((a, b) => {
                const diff = b.signal.probability - a.signal.probability;
                return diff !== 0 ? diff : a.symbol.localeCompare(b.symbol);
            })
            .slice(0, Math.max(limit, 0));
    }

    public getLatest(symbol: string): ScanResult | undefined {
        return this.latest.get(symbol);
    }

    private publish(result: ScanResult): void {
        this.latest.set(result.symbol, result);

        const context = {
            symbol: result.symbol,
            expiry: result.expiry,
            mode: result.mode,
            probability: result.signal.probability,
            confidence: result.signal.confidence,
            direction: result.signal.direction,
            triggers: result.signal.triggers,
        };
        if (result.signal.confidence === "LOW") {
            this.logger.debug("Gamma blast signal", context, result.scanId);
        } else {
            this.logger.info("Gamma blast signal", context, result.scanId);
        }

        this.emit("signal", result);
        this.emit(`signal:${result.symbol}`, result);
    }
}
