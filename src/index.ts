// src/index.ts

export { Config, GammaBlastDetectorSchema } from "./core/config.js";
export type {
    GammaBlastDetectorSettings,
    ScannerConfig,
} from "./core/config.js";
export { createDependencies } from "./core/dependencies.js";
export type { Dependencies, DependencyOverrides } from "./core/dependencies.js";

export { GammaBlastDetector } from "./indicators/gammaBlastDetector.js";
export { DirectionPredictor } from "./indicators/directionPredictor.js";
export { FallbackDetector } from "./indicators/fallbackDetector.js";
export {
    classifyConfidence,
    TIME_TO_BLAST_BY_CONFIDENCE,
} from "./indicators/confidenceClassifier.js";
export * from "./indicators/evaluators/index.js";
export type {
    EvaluationContext,
    IGammaBlastDetector,
    SignalEvaluator,
} from "./indicators/interfaces/detectorInterfaces.js";

export { Logger } from "./infrastructure/logger.js";
export type { ILogger } from "./infrastructure/loggerInterface.js";

export { SnapshotBuilder } from "./market/snapshotBuilder.js";
export {
    GammaBlastScanner,
    type IExpiryResolver,
    type ScanResult,
} from "./services/gammaBlastScanner.js";
export {
    SnapshotHistoryStore,
    type ISnapshotHistoryProvider,
} from "./storage/snapshotHistoryStore.js";

export * from "./types/snapshotTypes.js";
export * from "./types/optionChainTypes.js";
export { FinancialMath } from "./utils/financialMath.js";
export {
    ChainValidationError,
    ErrorHandler,
    StandardError,
} from "./utils/errorHandler.js";
export { TimeAwareCache } from "./utils/timeAwareCache.js";
