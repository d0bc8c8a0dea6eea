// src/indicators/gammaBlastDetector.ts
/**********************************************************************
 * GammaBlastDetector - adaptive statistical early warning
 *
 * Pure per call: (current, history) -> signal. Windows with at least
 * `minHistoryForAdaptive` snapshots run the six z-score/percentile
 * evaluators, the direction vote and the confidence table; shorter
 * windows go to the constant-threshold FallbackDetector.
 *********************************************************************/

import type { GammaBlastDetectorSettings } from "../core/config.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type {
    GammaBlastEvaluation,
    GammaBlastSignal,
    HistoryWindow,
    MarketSnapshot,
} from "../types/snapshotTypes.js";
import { FinancialMath } from "../utils/financialMath.js";
import { classifyConfidence } from "./confidenceClassifier.js";
import { DirectionPredictor } from "./directionPredictor.js";
import { createDefaultEvaluators } from "./evaluators/index.js";
import { fieldValues } from "./evaluators/evaluatorUtils.js";
import { FallbackDetector } from "./fallbackDetector.js";
import type {
    EvaluationContext,
    IGammaBlastDetector,
    SignalEvaluator,
} from "./interfaces/detectorInterfaces.js";

const PROBABILITY_DECIMALS = 6;

export class GammaBlastDetector implements IGammaBlastDetector {
    private readonly evaluators: readonly SignalEvaluator[];
    private readonly directionPredictor: DirectionPredictor;
    private readonly fallbackDetector: FallbackDetector;

    constructor(
        private readonly settings: GammaBlastDetectorSettings,
        private readonly logger: ILogger,
        evaluators: readonly SignalEvaluator[] = createDefaultEvaluators()
    ) {
        this.evaluators = evaluators;
        this.directionPredictor = new DirectionPredictor(
            settings.direction,
            settings.epsilon
        );
        this.fallbackDetector = new FallbackDetector(
            settings.fallback,
            settings.maxProbability
        );
    }

    public detect(
        current: MarketSnapshot,
        history: HistoryWindow
    ): GammaBlastSignal {
        return this.evaluate(current, history).signal;
    }

    public evaluate(
        current: MarketSnapshot,
        history: HistoryWindow
    ): GammaBlastEvaluation {
        const window = history.slice(0, this.settings.maxHistoryLength);

        if (window.length < this.settings.minHistoryForAdaptive) {
            if (this.logger.isDebugEnabled()) {
                this.logger.debug("Insufficient history, using fallback", {
                    historyLength: window.length,
                    required: this.settings.minHistoryForAdaptive,
                });
            }
            const signal = freezeSignal(
                this.fallbackDetector.detect(current, window)
            );
            return {
                signal,
                mode: "fallback",
                historyLength: window.length,
                rawProbability: signal.probability,
                directionBreakdown: null,
            };
        }

        return this.evaluateAdaptive(current, window);
    }

    private evaluateAdaptive(
        current: MarketSnapshot,
        history: HistoryWindow
    ): GammaBlastEvaluation {
        const context: EvaluationContext = {
            current,
            history,
            settings: this.settings,
            gexPercentile: FinancialMath.calculatePercentileRank(
                current.netGex,
                fieldValues(history, "netGex")
            ),
        };

        let rawProbability = 0;
        const triggers: string[] = [];
        for (const evaluator of this.evaluators) {
            const contribution = evaluator.evaluate(context);
            if (contribution === null) continue;
            rawProbability += contribution.probability;
            triggers.push(contribution.trigger);
        }

        const probability = FinancialMath.financialRound(
            Math.min(Math.max(rawProbability, 0), this.settings.maxProbability),
            PROBABILITY_DECIMALS
        );

        const directionBreakdown = this.directionPredictor.predict(
            current,
            context.gexPercentile
        );
        const { confidence, timeToBlastMin } = classifyConfidence(
            probability,
            triggers.length,
            this.settings.confidence
        );

        if (this.logger.isDebugEnabled()) {
            this.logger.debug("Gamma blast evaluated", {
                probability,
                rawProbability,
                triggers,
                directionScore: directionBreakdown.score,
                gexPercentile: context.gexPercentile,
            });
        }

        return {
            signal: freezeSignal({
                probability,
                direction: directionBreakdown.direction,
                confidence,
                time_to_blast_min: timeToBlastMin,
                triggers,
                risk_level: confidence,
            }),
            mode: "adaptive",
            historyLength: history.length,
            rawProbability,
            directionBreakdown,
        };
    }
}

function freezeSignal(signal: GammaBlastSignal): GammaBlastSignal {
    return Object.freeze({
        ...signal,
        triggers: Object.freeze([...signal.triggers]),
    });
}
