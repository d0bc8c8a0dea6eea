// src/indicators/evaluators/index.ts

import type { SignalEvaluator } from "../interfaces/detectorInterfaces.js";
import { GammaConcentrationEvaluator } from "./gammaConcentrationEvaluator.js";
import { GexExtremeEvaluator } from "./gexExtremeEvaluator.js";
import { GexFlipEvaluator } from "./gexFlipEvaluator.js";
import { IvSpikeEvaluator } from "./ivSpikeEvaluator.js";
import { OiAccelerationEvaluator } from "./oiAccelerationEvaluator.js";
import { PinRiskEvaluator } from "./pinRiskEvaluator.js";

export { GammaConcentrationEvaluator } from "./gammaConcentrationEvaluator.js";
export { GexExtremeEvaluator } from "./gexExtremeEvaluator.js";
export { GexFlipEvaluator } from "./gexFlipEvaluator.js";
export { IvSpikeEvaluator } from "./ivSpikeEvaluator.js";
export { OiAccelerationEvaluator } from "./oiAccelerationEvaluator.js";
export { PinRiskEvaluator } from "./pinRiskEvaluator.js";

/**
 * Evaluation order doubles as trigger order in the emitted signal.
 */
export function createDefaultEvaluators(): readonly SignalEvaluator[] {
    return [
        new IvSpikeEvaluator(),
        new OiAccelerationEvaluator(),
        new GammaConcentrationEvaluator(),
        new PinRiskEvaluator(),
        new GexFlipEvaluator(),
        new GexExtremeEvaluator(),
    ];
}
