import { describe, test, expect } from '@jest/globals';
import { toBool, toFloat, toInt, toSigned, toSignedBig } from '../src/rows/convert';
import { IsConversion } from '../src/types/err';

describe('integer conversion', () => {
    test('accepts signed decimal text within the width', () => {
        expect(toSigned('127', 8)).toBe(127);
        expect(toSigned('-128', 8)).toBe(-128);
        expect(toSigned('+5', 16)).toBe(5);
        expect(toSigned('-0', 16)).toBe(0);
        expect(toSigned('2147483647', 32)).toBe(2147483647);
        expect(toSignedBig('-9223372036854775808', 64)).toBe(-9223372036854775808n);
    });

    test('rejects values outside the width instead of truncating', () => {
        expect(() => toSigned('128', 8)).toThrow('OUT_OF_RANGE:"128" is out of range for int8');
        expect(() => toSigned('-32769', 16)).toThrow('OUT_OF_RANGE:"-32769" is out of range for int16');
        expect(() => toSigned('2147483648', 32)).toThrow('OUT_OF_RANGE:"2147483648" is out of range for int32');
        expect(() => toSignedBig('9223372036854775808', 64)).toThrow('OUT_OF_RANGE:"9223372036854775808" is out of range for int64');
    });

    test('rejects anything that is not a plain base-10 integer', () => {
        for (const text of ['', ' 1', '1 ', '1.0', '1e3', '0x10', '1_000', '--1', 'abc']) {
            expect(() => toSigned(text, 32)).toThrow(`INVALID_SYNTAX:cannot parse "${text}" as int32`);
        }
    });

    test('int stays within the exactly representable range', () => {
        expect(toInt('9007199254740991')).toBe(Number.MAX_SAFE_INTEGER);
        expect(toInt('-9007199254740991')).toBe(Number.MIN_SAFE_INTEGER);
        expect(() => toInt('9007199254740992')).toThrow('OUT_OF_RANGE:"9007199254740992" is out of range for int');
        expect(() => toInt('9223372036854775808')).toThrow('OUT_OF_RANGE:"9223372036854775808" is out of range for int');
        expect(() => toInt('abc')).toThrow('INVALID_SYNTAX:cannot parse "abc" as int');
    });

    test('errors are Conversion DriverErrors', () => {
        let caught: unknown = null;
        try {
            toSigned('999', 8);
        } catch (err) {
            caught = err;
        }
        expect(IsConversion(caught)).toBe(true);
    });
});

describe('float conversion', () => {
    test('parses decimal and exponent forms', () => {
        expect(toFloat('3.14', 64)).toBe(3.14);
        expect(toFloat('.5', 64)).toBe(0.5);
        expect(toFloat('1.', 64)).toBe(1);
        expect(toFloat('-2.5e-3', 64)).toBe(-0.0025);
        expect(toFloat('1e39', 64)).toBe(1e39);
    });

    test('float32 rounds to single precision', () => {
        expect(toFloat('3.14', 32)).toBe(Math.fround(3.14));
        expect(toFloat('16777217', 32)).toBe(16777216);
    });

    test('float32 rounds the digits once, not via float64', () => {
        // the nearest double to these is 1 + 2^-24, exactly between 1 and 1 + 2^-23
        expect(toFloat('1.0000000596046447753906251', 32)).toBe(1.0000001192092896);
        expect(toFloat('-1.0000000596046447753906251', 32)).toBe(-1.0000001192092896);
        expect(toFloat('1.0000000596046447753906249', 32)).toBe(1);
        expect(toFloat('1.000000059604644775390625', 32)).toBe(1);
        expect(toFloat('16777219', 32)).toBe(16777220);
    });

    test('accepts infinities and NaN spelled out', () => {
        expect(toFloat('inf', 64)).toBe(Infinity);
        expect(toFloat('-Inf', 64)).toBe(-Infinity);
        expect(toFloat('+INFINITY', 32)).toBe(Infinity);
        expect(toFloat('NaN', 64)).toBeNaN();
    });

    test('finite text that overflows the width is out of range', () => {
        expect(() => toFloat('1e39', 32)).toThrow('OUT_OF_RANGE:"1e39" is out of range for float32');
        expect(() => toFloat('1e309', 64)).toThrow('OUT_OF_RANGE:"1e309" is out of range for float64');
    });

    test('rejects malformed text', () => {
        for (const text of ['', 'abc', '1e', '1.2.3', ' 1', 'Infinityx']) {
            expect(() => toFloat(text, 64)).toThrow(`INVALID_SYNTAX:cannot parse "${text}" as float64`);
        }
    });
});

describe('bool conversion', () => {
    test('accepts the usual spellings', () => {
        for (const text of ['1', 't', 'T', 'TRUE', 'true', 'True']) {
            expect(toBool(text)).toBe(true);
        }
        for (const text of ['0', 'f', 'F', 'FALSE', 'false', 'False']) {
            expect(toBool(text)).toBe(false);
        }
    });

    test('rejects anything else', () => {
        for (const text of ['', '2', 'yes', 'tRUE', ' 1']) {
            expect(() => toBool(text)).toThrow(`INVALID_SYNTAX:cannot parse "${text}" as bool`);
        }
    });
});
