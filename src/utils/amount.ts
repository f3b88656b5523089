/**
 * Yocto amounts travel as decimal strings and are computed as bigint.
 */

const INTEGER_PATTERN = /^\d+$/;

/**
 * Parses an integer yocto amount. Surrounding quotes and a fractional part are
 * dropped; anything else that is not a non-negative integer yields null.
 */
export function parseAmount(raw: unknown): bigint | null {
    if (typeof raw === 'bigint') {
        return raw >= 0n ? raw : null;
    }
    if (typeof raw === 'number') {
        return Number.isFinite(raw) && raw >= 0 ? BigInt(Math.trunc(raw)) : null;
    }
    if (typeof raw !== 'string') {
        return null;
    }
    const cleaned = raw.trim().replace(/^"|"$/g, '').split('.')[0];
    return INTEGER_PATTERN.test(cleaned) ? BigInt(cleaned) : null;
}

export function toBigInt(value: string): bigint {
    return parseAmount(value) ?? 0n;
}

export function sumAmounts(values: readonly string[]): bigint {
    return values.reduce((total, value) => total + toBigInt(value), 0n);
}
