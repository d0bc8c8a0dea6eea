// src/market/snapshotBuilder.ts

import { z } from "zod";
import {
    OptionChainRowSchema,
    type GammaProfile,
    type OptionChainRow,
    type StrikeGex,
} from "../types/optionChainTypes.js";
import type { MarketSnapshot } from "../types/snapshotTypes.js";
import { ChainValidationError } from "../utils/errorHandler.js";
import { FinancialMath } from "../utils/financialMath.js";

export interface SnapshotBuilderOptions {
    /** Contract multiplier used in per-strike GEX (default: 100) */
    contractMultiplier?: number;
}

export interface BuiltSnapshot {
    snapshot: MarketSnapshot;
    profile: GammaProfile;
}

const OptionChainSchema = z.array(OptionChainRowSchema).min(1);

/**
 * Condenses one option chain (per-strike OI, IV and gamma) into the
 * MarketSnapshot the detector consumes. Greeks are inputs here, never
 * computed.
 */
export class SnapshotBuilder {
    private readonly contractMultiplier: number;

    constructor(options: SnapshotBuilderOptions = {}) {
        this.contractMultiplier = options.contractMultiplier ?? 100;
    }

    public build(
        rows: unknown,
        spotPrice: number,
        timestamp: number,
        symbol?: string
    ): BuiltSnapshot {
        if (!FinancialMath.isFiniteNumber(spotPrice) || spotPrice <= 0) {
            throw new ChainValidationError(
                `Invalid spot price: ${spotPrice}`,
                symbol
            );
        }

        const parsed = OptionChainSchema.safeParse(rows);
        if (!parsed.success) {
            const first = parsed.error.errors[0];
            throw new ChainValidationError(
                `Invalid option chain: ${first ? `${first.path.join(".")} ${first.message}` : "unknown"}`,
                symbol
            );
        }

        const chain = [...parsed.data].sort((a, b) => a.strike - b.strike);
        const atmRow = this.findAtmRow(chain, spotPrice);
        const profile = this.buildGammaProfile(chain, spotPrice, atmRow.strike);

        const snapshot: MarketSnapshot = {
            timestamp,
            atmIv: averageNonZero([atmRow.ceIv, atmRow.peIv]),
            atmOi: (atmRow.ceOi ?? 0) + (atmRow.peOi ?? 0),
            gammaConcentration: profile.gammaConcentration,
            netGex: profile.netGex,
            spotPrice,
            atmStrike: atmRow.strike,
            ceOiTotal: sum(chain.map((row) => row.ceOi)),
            peOiTotal: sum(chain.map((row) => row.peOi)),
            ceIvAvg: averageNonZero(chain.map((row) => row.ceIv)),
            peIvAvg: averageNonZero(chain.map((row) => row.peIv)),
        };

        return { snapshot, profile };
    }

    /**
     * Per-strike dealer gamma exposure; calls positive, puts negative.
     */
    public buildGammaProfile(
        chain: readonly OptionChainRow[],
        spotPrice: number,
        atmStrike: number
    ): GammaProfile {
        const scale = this.contractMultiplier * spotPrice * spotPrice * 0.01;
        const strikes: StrikeGex[] = chain.map((row) => {
            const ceGex = (row.ceGamma ?? 0) * (row.ceOi ?? 0) * scale;
            const peGex = -(row.peGamma ?? 0) * (row.peOi ?? 0) * scale;
            return { strike: row.strike, ceGex, peGex, netGex: ceGex + peGex };
        });

        let netGex = 0;
        let totalPositiveGex = 0;
        let totalNegativeGex = 0;
        let totalAbsGex = 0;
        let atmAbsGex = 0;
        let zeroGamma: StrikeGex | null = null;

        for (const level of strikes) {
            netGex += level.netGex;
            if (level.netGex > 0) totalPositiveGex += level.netGex;
            if (level.netGex < 0) totalNegativeGex += -level.netGex;
            totalAbsGex += Math.abs(level.netGex);
            if (level.strike === atmStrike) atmAbsGex = Math.abs(level.netGex);
            if (
                zeroGamma === null ||
                Math.abs(level.netGex) < Math.abs(zeroGamma.netGex)
            ) {
                zeroGamma = level;
            }
        }

        return {
            strikes,
            netGex,
            totalPositiveGex,
            totalNegativeGex,
            zeroGammaLevel: zeroGamma?.strike ?? null,
            atmStrike,
            gammaConcentration: totalAbsGex > 0 ? atmAbsGex / totalAbsGex : 0,
        };
    }

    /**
     * Strike nearest spot; on an exact tie the lower strike wins.
     */
    private findAtmRow(
        chain: readonly OptionChainRow[],
        spotPrice: number
    ): OptionChainRow {
        let best: OptionChainRow | undefined;
        for (const row of chain) {
            if (
                best === undefined ||
                Math.abs(row.strike - spotPrice) <
                    Math.abs(best.strike - spotPrice)
            ) {
                best = row;
            }
        }
        if (best === undefined) {
            throw new ChainValidationError("Option chain has no strikes");
        }
        return best;
    }
}

function sum(values: readonly (number | null | undefined)[]): number {
    return values.reduce<number>((acc, v) => acc + (v ?? 0), 0);
}

function averageNonZero(
    values: readonly (number | null | undefined)[]
): number | null {
    const present = values.filter(
        (v): v is number => FinancialMath.isFiniteNumber(v) && v !== 0
    );
    if (present.length === 0) return null;
    return FinancialMath.calculateMean(present);
}
