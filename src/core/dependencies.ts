// src/core/dependencies.ts

import { GammaBlastDetector } from "../indicators/gammaBlastDetector.js";
import { Logger } from "../infrastructure/logger.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import { SnapshotBuilder } from "../market/snapshotBuilder.js";
import {
    GammaBlastScanner,
    type IExpiryResolver,
} from "../services/gammaBlastScanner.js";
import {
    SnapshotHistoryStore,
    type ISnapshotHistoryProvider,
} from "../storage/snapshotHistoryStore.js";
import { TimeAwareCache } from "../utils/timeAwareCache.js";
import { Config } from "./config.js";

/**
 * Application dependencies interface
 */
export interface Dependencies {
    logger: ILogger;
    detector: GammaBlastDetector;
    snapshotBuilder: SnapshotBuilder;
    historyStore: SnapshotHistoryStore;
    scanner: GammaBlastScanner;
}

export interface DependencyOverrides {
    logger?: ILogger;
    /** Replaces the in-process store as the scanner's history source */
    historyProvider?: ISnapshotHistoryProvider;
}

/**
 * Factory function to create dependencies
 */
export function createDependencies(
    expiryResolver: IExpiryResolver,
    overrides: DependencyOverrides = {}
): Dependencies {
    Config.validate();

    const logging = Config.LOGGING;
    const logger =
        overrides.logger ??
        new Logger({ pretty: logging.pretty, level: logging.level });

    const settings = Config.GAMMA_BLAST;
    const scannerConfig = Config.SCANNER;

    const detector = new GammaBlastDetector(settings, logger);
    const historyStore = new SnapshotHistoryStore(settings.maxHistoryLength);
    const scanner = new GammaBlastScanner({
        detector,
        historyProvider: overrides.historyProvider ?? historyStore,
        expiryResolver,
        expiryCache: new TimeAwareCache<string, string>(
            scannerConfig.expiryCacheTtlMs
        ),
        logger,
        config: scannerConfig,
    });

    logger.info("Gamma blast dependencies created", {
        symbols: scannerConfig.symbols,
        minHistoryForAdaptive: settings.minHistoryForAdaptive,
        maxHistoryLength: settings.maxHistoryLength,
    });

    return {
        logger,
        detector,
        snapshotBuilder: new SnapshotBuilder(),
        historyStore,
        scanner,
    };
}
