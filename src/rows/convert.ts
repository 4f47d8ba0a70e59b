// src/rows/convert.ts
//
// Text-protocol values arrive as ASCII whatever the column type; these
// helpers turn them into JS scalars and throw a Conversion DriverError
// (INVALID_SYNTAX / OUT_OF_RANGE) when the text does not fit the target.
import type { DriverError } from '../types/err';
import { DrvError } from '../internal/err';

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY = /^([+-]?)inf(?:inity)?$/i;
const NAN = /^nan$/i;

export type IntBits = 8 | 16 | 32 | 64;

const INT_LIMITS: Record<IntBits, [bigint, bigint]> = {
    8: [-(2n ** 7n), 2n ** 7n - 1n],
    16: [-(2n ** 15n), 2n ** 15n - 1n],
    32: [-(2n ** 31n), 2n ** 31n - 1n],
    64: [-(2n ** 63n), 2n ** 63n - 1n],
};

function invalid(text: string, type: string): DriverError {
    return DrvError(`INVALID_SYNTAX:cannot parse "${text}" as ${type}`);
}

function outOfRange(text: string, type: string): DriverError {
    return DrvError(`OUT_OF_RANGE:"${text}" is out of range for ${type}`);
}

// toSignedBig parses a base-10 signed integer that must fit in `bits` bits.
export function toSignedBig(text: string, bits: IntBits): bigint {
    const type = `int${bits}`;
    if (!INTEGER.test(text)) {
        throw invalid(text, type);
    }

    const value = BigInt(text);
    const [min, max] = INT_LIMITS[bits];
    if (value < min || value > max) {
        throw outOfRange(text, type);
    }
    return value;
}

export function toSigned(text: string, bits: 8 | 16 | 32): number {
    return Number(toSignedBig(text, bits));
}

// toInt accepts any integer that a JS number holds exactly.
export function toInt(text: string): number {
    if (!INTEGER.test(text)) {
        throw invalid(text, 'int');
    }

    const value = BigInt(text);
    if (value < BigInt(Number.MIN_SAFE_INTEGER) || value > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw outOfRange(text, 'int');
    }
    return Number(value);
}

/**
 * toFloat reads a decimal float, `inf`/`infinity` (signed) or `nan`, all
 * case-insensitive. With bits = 32 the result is rounded to single precision.
 * Finite text that only fits as ±Infinity is out of range.
 */
export function toFloat(text: string, bits: 32 | 64): number {
    const type = `float${bits}`;

    const inf = INFINITY.exec(text);
    if (inf) {
        return inf[1] === '-' ? -Infinity : Infinity;
    }
    if (NAN.test(text)) {
        return NaN;
    }
    if (!DECIMAL.test(text)) {
        throw invalid(text, type);
    }

    const value = bits === 32 ? toFloat32(text) : Number(text);
    if (!Number.isFinite(value)) {
        throw outOfRange(text, type);
    }
    return value;
}

/**
 * toFloat32 rounds decimal text to single precision once. Going through the
 * nearest double first gives the same float32 unless that double sits exactly
 * halfway between two float32 values; then the digits decide the side.
 */
function toFloat32(text: string): number {
    const wide = Number(text);
    const narrow = Math.fround(wide);
    if (narrow === wide || Number.isNaN(wide) || !Number.isFinite(wide)) {
        return narrow;
    }

    const abs = Math.abs(wide);
    const rounded = Math.abs(narrow);
    const [lo, hi] = rounded > abs
        ? [float32Step(rounded, -1), rounded]
        : [rounded, float32Step(rounded, 1)];
    const mid = Number.isFinite(hi) ? (lo + hi) / 2 : lo + (lo - float32Step(lo, -1)) / 2;
    if (abs !== mid) {
        return narrow;
    }

    const cmp = compareDecimal(text.replace(/^[+-]/, ''), mid);
    const picked = cmp > 0 ? hi : cmp < 0 ? lo : rounded;
    return wide < 0 ? -picked : picked;
}

// float32Step moves a non-negative float32 one unit in the last place.
function float32Step(value: number, dir: 1 | -1): number {
    const buf = Buffer.alloc(4);
    buf.writeFloatBE(value);
    buf.writeUInt32BE(buf.readUInt32BE(0) + dir);
    return buf.readFloatBE(0);
}

// compareDecimal compares unsigned decimal text with a finite positive double, exactly.
function compareDecimal(text: string, value: number): number {
    const [mantissa, exp = '0'] = text.split(/[eE]/);
    const [whole, frac = ''] = mantissa.split('.');
    const digits = BigInt(whole + frac || '0');
    const scale = Number(exp) - frac.length;

    const buf = Buffer.alloc(8);
    buf.writeDoubleBE(value);
    const high = buf.readUInt32BE(0);
    const field = (high >>> 20) & 0x7ff;
    const fraction = (BigInt(high & 0xfffff) << 32n) | BigInt(buf.readUInt32BE(4));
    const significand = field === 0 ? fraction : fraction | (1n << 52n);
    const shift = field === 0 ? -1074 : field - 1075;

    let lhs = digits;
    let rhs = significand;
    if (scale >= 0) lhs *= 10n ** BigInt(scale);
    else rhs *= 10n ** BigInt(-scale);
    if (shift >= 0) rhs <<= BigInt(shift);
    else lhs <<= BigInt(-shift);

    return lhs > rhs ? 1 : lhs < rhs ? -1 : 0;
}

export function toBool(text: string): boolean {
    switch (text) {
        case '1': case 't': case 'T': case 'TRUE': case 'true': case 'True':
            return true;
        case '0': case 'f': case 'F': case 'FALSE': case 'false': case 'False':
            return false;
        default:
            throw invalid(text, 'bool');
    }
}
