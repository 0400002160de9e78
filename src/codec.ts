/**
 * Register Codec
 * Stateless encode/decode of PowerTag wire types to and from 16-bit register words.
 * Words are composed most-significant-word first, bytes big-endian inside each word.
 */

import { TextDecoder } from 'util';
import * as CONST from './constants';
import {
    DateTimeFields,
    PowerTagInvalidTimestampError,
    PowerTagMalformedResponseError,
    PowerTagValueError
} from './errors';

export type PowerTagDateTime = DateTimeFields;

/**
 * Copy register words into a big-endian buffer after checking the count
 *
 * @throws {PowerTagMalformedResponseError} On a count mismatch or a word outside 0..0xFFFF
 */
export function wordsToBuffer(words: readonly number[], expected: number, wireType: string): Buffer {
    if (words.length !== expected) {
        throw new PowerTagMalformedResponseError(wireType, expected, words.length);
    }

    const buf = Buffer.alloc(expected * 2);
    words.forEach((word, i) => {
        if (!Number.isInteger(word) || word < 0 || word > CONST.MAX_REGISTER_VALUE) {
            throw new PowerTagMalformedResponseError(wireType, expected, words.length, `word ${i} is ${word}`);
        }
        buf.writeUInt16BE(word, i * 2);
    });
    return buf;
}

function bufferToWords(buf: Buffer): number[] {
    const words: number[] = [];
    for (let offset = 0; offset < buf.length; offset += 2) {
        words.push(buf.readUInt16BE(offset));
    }
    return words;
}

function assertInteger(value: number, max: number, wireType: string): void {
    if (!Number.isInteger(value) || value < 0 || value > max) {
        throw new PowerTagValueError(`${wireType} value out of range: ${value}`);
    }
}

// --- 16-bit unsigned ---

export function decodeUint16(words: readonly number[]): number | null {
    const value = wordsToBuffer(words, CONST.REG_SIZE_16, 'uint16').readUInt16BE(0);
    return value === CONST.UINT16_NOT_AVAILABLE ? null : value;
}

export function encodeUint16(value: number | null): number[] {
    if (value === null) return [CONST.UINT16_NOT_AVAILABLE];
    assertInteger(value, CONST.MAX_REGISTER_VALUE, 'uint16');
    return [value];
}

// --- 32-bit unsigned ---

export function decodeUint32(words: readonly number[]): number | null {
    const value = wordsToBuffer(words, CONST.REG_SIZE_32, 'uint32').readUInt32BE(0);
    return value === CONST.UINT32_NOT_AVAILABLE ? null : value;
}

export function encodeUint32(value: number | null): number[] {
    const buf = Buffer.alloc(4);
    if (value === null) {
        buf.writeUInt32BE(CONST.UINT32_NOT_AVAILABLE);
    } else {
        assertInteger(value, 0xFFFFFFFF, 'uint32');
        buf.writeUInt32BE(value);
    }
    return bufferToWords(buf);
}

// --- 64-bit unsigned ---

export function decodeUint64(words: readonly number[]): bigint | null {
    const value = wordsToBuffer(words, CONST.REG_SIZE_64, 'uint64').readBigUInt64BE(0);
    return value === CONST.UINT64_NOT_AVAILABLE ? null : value;
}

export function encodeUint64(value: bigint | null): number[] {
    const raw = value === null ? CONST.UINT64_NOT_AVAILABLE : value;
    if (raw < 0n || raw > 0xFFFFFFFFFFFFFFFFn) {
        throw new PowerTagValueError(`uint64 value out of range: ${raw}`);
    }
    const buf = Buffer.alloc(8);
    buf.writeBigUInt64BE(raw);
    return bufferToWords(buf);
}

// --- 32-bit IEEE-754 float ---

/**
 * NaN is the "not available" pattern; +/-Infinity are returned as values.
 */
export function decodeFloat32(words: readonly number[]): number | null {
    const value = wordsToBuffer(words, CONST.REG_SIZE_32, 'float32').readFloatBE(0);
    return Number.isNaN(value) ? null : value;
}

export function encodeFloat32(value: number | null): number[] {
    const buf = Buffer.alloc(4);
    buf.writeFloatBE(value === null ? NaN : value);
    return bufferToWords(buf);
}

// --- Fixed-length ASCII string ---

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode `count` registers as text (UTF-8, so plain ASCII reads unchanged).
 *
 * Only the first `maxLength` bytes are considered when the device limits the
 * field to fewer characters than the registers hold. Zero bytes are removed
 * wherever they appear; an all-zero field is "not available".
 *
 * @throws {PowerTagMalformedResponseError} If the bytes are not valid UTF-8
 */
export function decodeString(words: readonly number[], count: number, maxLength: number = count * 2): string | null {
    const bytes = wordsToBuffer(words, count, 'string').subarray(0, Math.min(maxLength, count * 2));

    if (bytes.every(b => b === 0)) return null;

    try {
        return utf8.decode(bytes.filter(b => b !== 0));
    } catch (e) {
        throw new PowerTagMalformedResponseError('string', count, words.length, `not valid UTF-8: ${bytes.toString('hex')}`);
    }
}

/**
 * Encode an ASCII string into `count` registers, zero padded
 *
 * @throws {PowerTagValueError} If the text is longer than `maxLength` or not ASCII
 */
export function encodeString(value: string, count: number, maxLength: number = count * 2): number[] {
    const limit = Math.min(maxLength, count * 2);
    if (value.length > limit) {
        throw new PowerTagValueError(`String "${value}" exceeds ${limit} characters`);
    }
    if (!/^[\x01-\x7F]*$/.test(value)) {
        throw new PowerTagValueError(`String "${value}" contains non-ASCII characters`);
    }

    const buf = Buffer.alloc(count * 2);
    buf.write(value, 0, 'ascii');
    return bufferToWords(buf);
}

// --- Packed date-time ---

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

function daysInMonth(year: number, month: number): number {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return month === 2 && leap ? 29 : DAYS_IN_MONTH[month - 1];
}

function isValidDateTime(dt: PowerTagDateTime): boolean {
    const fields = [dt.year, dt.month, dt.day, dt.hour, dt.minute, dt.second, dt.millisecond];
    if (!fields.every(v => Number.isInteger(v) && v >= 0)) return false;
    if (dt.month < 1 || dt.month > 12) return false;
    if (dt.day < 1 || dt.day > daysInMonth(dt.year, dt.month)) return false;
    return dt.hour <= 23 && dt.minute <= 59 && dt.second <= 59 && dt.millisecond <= 999;
}

/**
 * Decode the 4-register device timestamp:
 *   word 0: year - 2000 (bits 0-6)
 *   word 1: month (bits 8-11), day (bits 0-4)
 *   word 2: hour (bits 8-12), minute (bits 0-5)
 *   word 3: seconds * 1000 + milliseconds
 *
 * @throws {PowerTagInvalidTimestampError} If the fields do not form a calendar date-time
 */
export function decodeDateTime(words: readonly number[]): PowerTagDateTime | null {
    const buf = wordsToBuffer(words, CONST.REG_SIZE_DATETIME, 'datetime');
    if (words.every(w => w === CONST.UINT16_NOT_AVAILABLE)) return null;

    const yearRaw = buf.readUInt16BE(0);
    const dayMonth = buf.readUInt16BE(2);
    const minuteHour = buf.readUInt16BE(4);
    const secondMillisecond = buf.readUInt16BE(6);

    const dt: PowerTagDateTime = {
        year: (yearRaw & 0b0111_1111) + CONST.DATETIME_YEAR_BASE,
        month: (dayMonth >> 8) & 0b0000_1111,
        day: dayMonth & 0b0001_1111,
        hour: (minuteHour >> 8) & 0b0001_1111,
        minute: minuteHour & 0b0011_1111,
        second: Math.floor(secondMillisecond / 1000),
        millisecond: secondMillisecond % 1000
    };

    if (!isValidDateTime(dt)) {
        throw new PowerTagInvalidTimestampError(dt);
    }
    return dt;
}

export function encodeDateTime(value: PowerTagDateTime | null): number[] {
    if (value === null) return Array<number>(CONST.REG_SIZE_DATETIME).fill(CONST.UINT16_NOT_AVAILABLE);

    const offset = value.year - CONST.DATETIME_YEAR_BASE;
    if (offset < 0 || offset > 0b0111_1111 || !isValidDateTime(value)) {
        throw new PowerTagValueError(`Date-time cannot be packed: ${JSON.stringify(value)}`);
    }

    return [
        offset,
        (value.month << 8) | value.day,
        (value.hour << 8) | value.minute,
        value.second * 1000 + value.millisecond
    ];
}

/**
 * Interpret a device timestamp in the host's local time zone
 */
export function dateTimeToDate(dt: PowerTagDateTime): Date {
    return new Date(dt.year, dt.month - 1, dt.day, dt.hour, dt.minute, dt.second, dt.millisecond);
}

/**
 * Render a device timestamp without a zone, e.g. "2024-01-05T10:30:03.700"
 */
export function formatDateTime(dt: PowerTagDateTime): string {
    const pad = (n: number, width = 2) => String(n).padStart(width, '0');
    return `${dt.year}-${pad(dt.month)}-${pad(dt.day)}T${pad(dt.hour)}:${pad(dt.minute)}:${pad(dt.second)}.${pad(dt.millisecond, 3)}`;
}

// --- Raw word ---

/**
 * Single register without sentinel handling, for bitmaps and status codes
 */
export function decodeWord(words: readonly number[], wireType = 'bitmap'): number {
    return wordsToBuffer(words, CONST.REG_SIZE_16, wireType).readUInt16BE(0);
}
