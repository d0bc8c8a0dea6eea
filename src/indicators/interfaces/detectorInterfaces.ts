// src/indicators/interfaces/detectorInterfaces.ts

import type { GammaBlastDetectorSettings } from "../../core/config.js";
import type {
    GammaBlastEvaluation,
    GammaBlastSignal,
    HistoryWindow,
    MarketSnapshot,
    SignalContribution,
} from "../../types/snapshotTypes.js";

/**
 * Everything an evaluator may read for one detector invocation.
 */
export interface EvaluationContext {
    current: MarketSnapshot;
    /** Newest first, already capped at maxHistoryLength */
    history: HistoryWindow;
    settings: GammaBlastDetectorSettings;
    /** Percentile rank of current netGex; shared with the direction predictor */
    gexPercentile: number | null;
}

/**
 * One independent statistical check. Returns null when it does not fire,
 * including when the data it needs is missing or degenerate.
 */
export interface SignalEvaluator {
    readonly name: string;
    evaluate(context: EvaluationContext): SignalContribution | null;
}

export interface IGammaBlastDetector {
    detect(current: MarketSnapshot, history: HistoryWindow): GammaBlastSignal;
    evaluate(
        current: MarketSnapshot,
        history: HistoryWindow
    ): GammaBlastEvaluation;
}
