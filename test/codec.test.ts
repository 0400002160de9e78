import {
    dateTimeToDate,
    decodeDateTime,
    decodeFloat32,
    decodeString,
    decodeUint16,
    decodeUint32,
    decodeUint64,
    decodeWord,
    encodeDateTime,
    encodeFloat32,
    encodeString,
    encodeUint16,
    encodeUint32,
    encodeUint64,
    formatDateTime
} from '../src/codec';
import { PowerTagInvalidTimestampError, PowerTagMalformedResponseError, PowerTagValueError } from '../src/errors';

describe('codec', () => {
    describe('uint16', () => {
        test('decodes a plain value', () => {
            expect(decodeUint16([0x1234])).toBe(0x1234);
        });
        test('decodes 0xFFFF as not available', () => {
            expect(decodeUint16([0xFFFF])).toBeNull();
        });
        test('encodes null as the sentinel', () => {
            expect(encodeUint16(null)).toEqual([0xFFFF]);
        });
        test('round-trips values below the sentinel', () => {
            for (const v of [0, 1, 0x7FFF, 0x8000, 0xFFFE]) {
                expect(decodeUint16(encodeUint16(v))).toBe(v);
            }
        });
        test('rejects a wrong register count', () => {
            expect(() => decodeUint16([])).toThrow(PowerTagMalformedResponseError);
            expect(() => decodeUint16([1, 2])).toThrow(PowerTagMalformedResponseError);
        });
        test('rejects words outside 16 bits', () => {
            expect(() => decodeUint16([0x10000])).toThrow(PowerTagMalformedResponseError);
            expect(() => decodeUint16([-1])).toThrow(PowerTagMalformedResponseError);
        });
        test('refuses to encode out of range values', () => {
            expect(() => encodeUint16(0x10000)).toThrow(PowerTagValueError);
            expect(() => encodeUint16(1.5)).toThrow(PowerTagValueError);
        });
    });

    describe('uint32', () => {
        test('composes high word first', () => {
            expect(decodeUint32([0x0001, 0x0002])).toBe(65538);
            expect(decodeUint32([0xFFFF, 0xFFFF])).toBe(4294967295);
        });
        test('decodes 0x80000000 as not available', () => {
            expect(decodeUint32([0x8000, 0x0000])).toBeNull();
        });
        test('encodes high word first', () => {
            expect(encodeUint32(65538)).toEqual([0x0001, 0x0002]);
            expect(encodeUint32(null)).toEqual([0x8000, 0x0000]);
        });
        test('round-trips values other than the sentinel', () => {
            for (const v of [0, 1, 0x7FFFFFFF, 0x80000001, 0xFFFFFFFF]) {
                expect(decodeUint32(encodeUint32(v))).toBe(v);
            }
        });
        test('malformed count', () => {
            expect(() => decodeUint32([1])).toThrow(PowerTagMalformedResponseError);
        });
    });

    describe('uint64', () => {
        test('composes four words high word first', () => {
            expect(decodeUint64([0x0123, 0x4567, 0x89AB, 0xCDEF])).toBe(0x0123456789ABCDEFn);
            expect(decodeUint64([0, 0, 0x0001, 0x0000])).toBe(65536n);
        });
        test('decodes 0x8000000000000000 as not available', () => {
            expect(decodeUint64([0x8000, 0, 0, 0])).toBeNull();
        });
        test('encodes high word first', () => {
            expect(encodeUint64(0x0123456789ABCDEFn)).toEqual([0x0123, 0x4567, 0x89AB, 0xCDEF]);
            expect(encodeUint64(null)).toEqual([0x8000, 0, 0, 0]);
        });
        test('rejects negative values', () => {
            expect(() => encodeUint64(-1n)).toThrow(PowerTagValueError);
        });
        test('malformed count', () => {
            expect(() => decodeUint64([0, 0])).toThrow(PowerTagMalformedResponseError);
        });
    });

    describe('float32', () => {
        test('decodes big-endian IEEE-754', () => {
            expect(decodeFloat32([0x4366, 0x8000])).toBe(230.5);
            expect(decodeFloat32([0x3F80, 0x0000])).toBe(1);
            expect(decodeFloat32([0xC020, 0x0000])).toBe(-2.5);
        });
        test('encodes big-endian IEEE-754', () => {
            expect(encodeFloat32(230.5)).toEqual([0x4366, 0x8000]);
        });
        test('decodes any NaN pattern as not available', () => {
            expect(decodeFloat32([0x7FC0, 0x0000])).toBeNull();
            expect(decodeFloat32([0x7F80, 0x0001])).toBeNull();
            expect(decodeFloat32([0xFFC0, 0x0000])).toBeNull();
        });
        test('keeps infinities as values', () => {
            expect(decodeFloat32([0x7F80, 0x0000])).toBe(Infinity);
            expect(decodeFloat32([0xFF80, 0x0000])).toBe(-Infinity);
        });
        test('round-trips single-precision values', () => {
            for (const v of [0, Math.fround(0.1), Math.fround(-1234.5678), Math.fround(3.4e38)]) {
                expect(decodeFloat32(encodeFloat32(v))).toBe(v);
            }
        });
        test('null encodes to a NaN pattern', () => {
            expect(decodeFloat32(encodeFloat32(null))).toBeNull();
        });
    });

    describe('string', () => {
        test('removes zero bytes wherever they are', () => {
            // "AB\0\0CD"
            expect(decodeString([0x4142, 0x0000, 0x4344], 3)).toBe('ABCD');
            // "\0AB\0"
            expect(decodeString([0x0041, 0x4200], 2)).toBe('AB');
        });
        test('decodes an all-zero field as not available', () => {
            expect(decodeString([0, 0, 0], 3)).toBeNull();
        });
        test('only looks at maxLength bytes', () => {
            expect(decodeString([0x4142, 0x4344], 2, 3)).toBe('ABC');
            expect(decodeString([0x0000, 0x0044], 2, 3)).toBeNull();
        });
        test('pads with zero bytes', () => {
            expect(encodeString('AB', 2)).toEqual([0x4142, 0x0000]);
            expect(encodeString('Kitchen', 10, 20)).toEqual([0x4B69, 0x7463, 0x6865, 0x6E00, 0, 0, 0, 0, 0, 0]);
        });
        test('decodes UTF-8 and never rewrites high bytes', () => {
            // "Caf" + 0xC3 0xA9
            expect(decodeString([0x4361, 0x66C3, 0xA900], 3)).toBe('Café');
            // "Caf" + lone 0xE9
            expect(() => decodeString([0x4361, 0x66E9], 2)).toThrow(PowerTagMalformedResponseError);
        });
        test('rejects text longer than the field', () => {
            expect(() => encodeString('TOOLONG', 3, 5)).toThrow(PowerTagValueError);
            expect(() => encodeString('ABCDE', 2)).toThrow(PowerTagValueError);
        });
        test('rejects non-ASCII text', () => {
            expect(() => encodeString('é', 2)).toThrow(PowerTagValueError);
        });
        test('round-trips ASCII', () => {
            expect(decodeString(encodeString('Q1', 3, 5), 3, 5)).toBe('Q1');
        });
        test('malformed count', () => {
            expect(() => decodeString([0x4142], 3)).toThrow(PowerTagMalformedResponseError);
        });
    });

    describe('datetime', () => {
        test('decodes the packed fields', () => {
            expect(decodeDateTime([24, 0x0105, 0x0A1E, 0x0E74])).toEqual({
                year: 2024,
                month: 1,
                day: 5,
                hour: 10,
                minute: 30,
                second: 3,
                millisecond: 700
            });
        });
        test('splits seconds and milliseconds from one field', () => {
            const dt = decodeDateTime([24, 0x0105, 0x0A1E, 59999]);
            expect(dt?.second).toBe(59);
            expect(dt?.millisecond).toBe(999);
        });
        test('ignores bits above the year offset', () => {
            expect(decodeDateTime([0x0118, 0x0105, 0x0A1E, 0])?.year).toBe(2024);
        });
        test('decodes four 0xFFFF words as not available', () => {
            expect(decodeDateTime([0xFFFF, 0xFFFF, 0xFFFF, 0xFFFF])).toBeNull();
        });
        test('a partially unset timestamp is invalid, not absent', () => {
            expect(() => decodeDateTime([0xFFFF, 0xFFFF, 0xFFFF, 0x0000])).toThrow(PowerTagInvalidTimestampError);
        });
        test('rejects month 13', () => {
            expect(() => decodeDateTime([24, 0x0D01, 0, 0])).toThrow(PowerTagInvalidTimestampError);
        });
        test('checks the day against the month', () => {
            expect(decodeDateTime([24, 0x021D, 0, 0])?.day).toBe(29);
            expect(() => decodeDateTime([23, 0x021D, 0, 0])).toThrow(PowerTagInvalidTimestampError);
            expect(() => decodeDateTime([24, 0x041F, 0, 0])).toThrow(PowerTagInvalidTimestampError);
        });
        test('rejects hour 24 and second 60', () => {
            expect(() => decodeDateTime([24, 0x0105, 0x1800, 0])).toThrow(PowerTagInvalidTimestampError);
            expect(() => decodeDateTime([24, 0x0105, 0x0A1E, 60000])).toThrow(PowerTagInvalidTimestampError);
        });
        test('malformed count', () => {
            expect(() => decodeDateTime([24, 0x0105, 0x0A1E])).toThrow(PowerTagMalformedResponseError);
        });
        test('encodes the packed fields', () => {
            const dt = { year: 2024, month: 1, day: 5, hour: 10, minute: 30, second: 3, millisecond: 700 };
            expect(encodeDateTime(dt)).toEqual([24, 0x0105, 0x0A1E, 3700]);
            expect(encodeDateTime(null)).toEqual([0xFFFF, 0xFFFF, 0xFFFF, 0xFFFF]);
        });
        test('refuses years outside 2000..2127', () => {
            const dt = { year: 1999, month: 1, day: 1, hour: 0, minute: 0, second: 0, millisecond: 0 };
            expect(() => encodeDateTime(dt)).toThrow(PowerTagValueError);
        });
        test('formats without a zone', () => {
            const dt = { year: 2024, month: 1, day: 5, hour: 10, minute: 30, second: 3, millisecond: 7 };
            expect(formatDateTime(dt)).toBe('2024-01-05T10:30:03.007');
        });
        test('converts to a local Date', () => {
            const date = dateTimeToDate({ year: 2024, month: 1, day: 5, hour: 10, minute: 30, second: 3, millisecond: 700 });
            expect(date.getFullYear()).toBe(2024);
            expect(date.getMonth()).toBe(0);
            expect(date.getDate()).toBe(5);
            expect(date.getHours()).toBe(10);
            expect(date.getMinutes()).toBe(30);
            expect(date.getSeconds()).toBe(3);
            expect(date.getMilliseconds()).toBe(700);
        });
    });

    describe('decodeWord', () => {
        test('returns the raw word, sentinel included', () => {
            expect(decodeWord([0xFFFF])).toBe(0xFFFF);
        });
    });
});
