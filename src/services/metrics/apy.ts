import { ApyCompounding } from '../../config';

const RATE_SCALE = 10n ** 18n;

export function roundTo(value: number, decimals: number): number {
    const factor = Math.pow(10, decimals);
    return Math.round(value * factor) / factor;
}

/**
 * Annual percentage yield from one epoch's rewards. The rate is taken over the
 * stake the epoch started with (`totalStaked - epochRewards`); `simple`
 * multiplies it by the epochs in a year, `compound` compounds it once per
 * epoch. Rounded to 2 decimals, 0 when there is no base to earn on.
 */
export function calculateApy(
    epochRewards: bigint,
    totalStaked: bigint,
    epochsPerYear: number,
    compounding: ApyCompounding
): number {
    const base = totalStaked - epochRewards;
    if (base <= 0n || epochRewards <= 0n) {
        return 0;
    }

    const rate = Number((epochRewards * RATE_SCALE) / base) / Number(RATE_SCALE);
    const apy = compounding === 'compound'
        ? (Math.pow(1 + rate, epochsPerYear) - 1) * 100
        : rate * epochsPerYear * 100;
    return roundTo(apy, 2);
}

/**
 * produced / expected clamped to [0, 1]; 0 while nothing is expected.
 */
export function productionRate(produced: number, expected: number): number {
    if (expected <= 0) {
        return 0;
    }
    return Math.min(1, Math.max(0, produced / expected));
}
