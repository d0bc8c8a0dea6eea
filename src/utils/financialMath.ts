// src/utils/financialMath.ts
import { Decimal } from "decimal.js";

// Configure Decimal.js for statistics over option-chain metrics
Decimal.set({
    precision: 34,
    rounding: Decimal.ROUND_HALF_EVEN,
});

export class FinancialMath {
    /**
     * Keep only finite numbers; missing metrics arrive as null.
     */
    static finiteValues(values: readonly (number | null)[]): number[] {
        const result: number[] = [];
        for (const value of values) {
            if (FinancialMath.isFiniteNumber(value)) {
                result.push(value);
            }
        }
        return result;
    }

    static isFiniteNumber(value: number | null | undefined): value is number {
        return typeof value === "number" && Number.isFinite(value);
    }

    /**
     * Calculate mean with precision handling
     */
    static calculateMean(values: readonly number[]): number {
        const validValues = FinancialMath.finiteValues(values);
        if (validValues.length === 0) {
            return 0;
        }
        const sum = validValues.reduce(
            (acc, val) => acc.plus(new Decimal(val)),
            new Decimal(0)
        );
        return sum.dividedBy(validValues.length).toNumber();
    }

    /**
     * Sample standard deviation (N - 1). Returns 0 below two samples.
     */
    static calculateStdDev(values: readonly number[]): number {
        const validValues = FinancialMath.finiteValues(values);
        if (validValues.length < 2) {
            return 0;
        }

        const mean = new Decimal(FinancialMath.calculateMean(validValues));
        const variance = validValues
            .reduce((acc, val) => {
                const diff = new Decimal(val).minus(mean);
                return acc.plus(diff.pow(2));
            }, new Decimal(0))
            .dividedBy(validValues.length - 1);

        return variance.sqrt().toNumber();
    }

    /**
     * (current - mean) / stddev against the historical values.
     * Null when there are fewer than two samples or no dispersion.
     */
    static calculateZScore(
        current: number | null,
        history: readonly (number | null)[]
    ): number | null {
        if (!FinancialMath.isFiniteNumber(current)) return null;

        const validValues = FinancialMath.finiteValues(history);
        if (validValues.length < 2) return null;

        const stdDev = FinancialMath.calculateStdDev(validValues);
        if (stdDev === 0) return null;

        const mean = FinancialMath.calculateMean(validValues);
        return new Decimal(current)
            .minus(mean)
            .dividedBy(stdDev)
            .toNumber();
    }

    /**
     * Share of historical values at or below `current`, as 0..100.
     */
    static calculatePercentileRank(
        current: number | null,
        history: readonly (number | null)[]
    ): number | null {
        if (!FinancialMath.isFiniteNumber(current)) return null;

        const validValues = FinancialMath.finiteValues(history);
        if (validValues.length === 0) return null;

        const atOrBelow = validValues.filter((v) => v <= current).length;
        return new Decimal(atOrBelow)
            .dividedBy(validValues.length)
            .times(100)
            .toNumber();
    }

    /**
     * Per-step differences of an oldest-first series (velocity).
     */
    static firstDerivative(series: readonly number[]): number[] {
        const velocity: number[] = [];
        for (let i = 1; i < series.length; i++) {
            const prev = series[i - 1];
            const next = series[i];
            if (prev === undefined || next === undefined) continue;
            velocity.push(new Decimal(next).minus(prev).toNumber());
        }
        return velocity;
    }

    /**
     * Difference of differences (acceleration). Empty below three points.
     */
    static secondDerivative(series: readonly number[]): number[] {
        if (series.length < 3) return [];
        return FinancialMath.firstDerivative(
            FinancialMath.firstDerivative(series)
        );
    }

    /**
     * Ratio whose denominator is floored at `epsilon`.
     */
    static safeDivide(
        numerator: number,
        denominator: number,
        epsilon: number
    ): number {
        if (isNaN(numerator) || isNaN(denominator)) {
            return 0;
        }
        const floor = Math.max(denominator, epsilon);
        return new Decimal(numerator).dividedBy(floor).toNumber();
    }

    static calculateAbs(value: number): number {
        if (isNaN(value)) return 0;
        return new Decimal(value).abs().toNumber();
    }

    static financialRound(value: number, decimals: number): number {
        if (isNaN(value)) return 0;
        return new Decimal(value)
            .toDecimalPlaces(decimals, Decimal.ROUND_HALF_EVEN)
            .toNumber();
    }
}
