/**
 * PowerTag Utility Functions
 * Reusable helpers for addressing and talking to the gateway
 */

import * as CONST from './constants';
import { PowerTagTimeoutError, PowerTagUnitIdError } from './errors';

/**
 * Check that a unit ID addresses a tag (1..247) or the gateway (255)
 *
 * @throws {PowerTagUnitIdError} Otherwise. This is a caller bug, not a device condition.
 */
export function assertUnitId(unitId: number): void {
    const isTag = Number.isInteger(unitId) && unitId >= CONST.MIN_UNIT_ID && unitId <= CONST.MAX_UNIT_ID;
    if (!isTag && unitId !== CONST.GATEWAY_UNIT_ID) {
        throw new PowerTagUnitIdError(unitId);
    }
}

/**
 * Parse a tag unit ID list into an array of IDs
 * Supports single IDs, ranges, and comma-separated lists
 *
 * @param unitIdStr - Unit ID list (e.g., "1", "1-10", "1,5,10-20")
 * @returns Sorted, deduplicated IDs inside 1..247; empty for a blank string
 */
export function parseUnitIds(unitIdStr: string): number[] {
    if (!unitIdStr || unitIdStr.trim() === '') {
        return [];
    }

    const ids: number[] = [];
    const parts = unitIdStr.split(',').map(s => s.trim());

    for (const part of parts) {
        if (part.includes('-')) {
            // Range: "10-20"
            const [start, end] = part.split('-').map(n => parseInt(n, 10));
            if (!isNaN(start) && !isNaN(end)) {
                for (let i = start; i <= end; i++) {
                    ids.push(i);
                }
            }
        } else {
            const id = parseInt(part, 10);
            if (!isNaN(id)) {
                ids.push(id);
            }
        }
    }

    return [...new Set(ids)]
        .filter(id => id >= CONST.MIN_UNIT_ID && id <= CONST.MAX_UNIT_ID)
        .sort((a, b) => a - b);
}

/**
 * Race an operation against a timer; the timer is cleared either way
 *
 * @throws {PowerTagTimeoutError} If the operation does not settle in time
 */
export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, operationName: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new PowerTagTimeoutError(operationName, timeoutMs)), timeoutMs);
    });

    try {
        return await Promise.race([operation, timeoutPromise]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Capped exponential backoff for auto-read retries
 */
export function retryDelay(consecutiveErrors: number, baseDelay = CONST.BASE_RETRY_DELAY, maxDelay = CONST.MAX_RETRY_DELAY): number {
    return Math.min(baseDelay * Math.pow(2, Math.max(consecutiveErrors - 1, 0)), maxDelay);
}

export function formatHex(value: number, width = 4): string {
    return `0x${value.toString(16).toUpperCase().padStart(width, '0')}`;
}
