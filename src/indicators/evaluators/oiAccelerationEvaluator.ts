// src/indicators/evaluators/oiAccelerationEvaluator.ts

import type { SignalContribution } from "../../types/snapshotTypes.js";
import { FinancialMath } from "../../utils/financialMath.js";
import type {
    EvaluationContext,
    SignalEvaluator,
} from "../interfaces/detectorInterfaces.js";
import { formatSigma, oldestFirstSeries } from "./evaluatorUtils.js";

/**
 * Second derivative of ATM open interest.
 *
 * The window plus the current sample form one oldest-first series; every
 * consecutive triple yields an acceleration. The newest acceleration (the one
 * ending at the current sample) is z-scored against all earlier ones.
 * Unwinding carries more weight than buildup.
 */
export class OiAccelerationEvaluator implements SignalEvaluator {
    public readonly name = "oiAcceleration";

    public evaluate(context: EvaluationContext): SignalContribution | null {
        const { current, history, settings } = context;
        if (!FinancialMath.isFiniteNumber(current.atmOi)) return null;

        const series = [...oldestFirstSeries(history, "atmOi"), current.atmOi];
        const accelerations = FinancialMath.secondDerivative(series);
        const latest = accelerations[accelerations.length - 1];
        if (latest === undefined) return null;

        const z = FinancialMath.calculateZScore(
            latest,
            accelerations.slice(0, -1)
        );
        if (z === null) return null;

        const cfg = settings.oiAcceleration;
        if (z <= cfg.unwindZ) {
            return {
                probability: cfg.unwindWeight,
                trigger: `OI Unwinding (${formatSigma(z)})`,
            };
        }
        if (z >= cfg.buildupZ) {
            return {
                probability: cfg.buildupWeight,
                trigger: `OI Buildup (${formatSigma(z)})`,
            };
        }
        return null;
    }
}
