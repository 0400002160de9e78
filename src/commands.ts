import { PowerTagValueError } from './errors';
import { PowerTagGateway } from './powertag-gateway';
import { GatewaySnapshot, TagSnapshot, readGatewaySnapshot, readTagSnapshot } from './snapshot';
import { assertUnitId, parseUnitIds } from './utils';

export type GatewayCommand =
    | { kind: 'read'; tags?: number[] }
    | { kind: 'reset-peak-demands'; tag: number }
    | { kind: 'set-name'; tag: number; name: string }
    | { kind: 'set-circuit'; tag: number; circuit: string };

export interface ReadResult {
    gateway: GatewaySnapshot;
    tags: Record<number, TagSnapshot>;
}

export interface ExecuteOptions {
    tags: number[];
    includeIdentity?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireTag(payload: Record<string, unknown>, topic: string): number {
    const tag = payload.tag;
    if (typeof tag !== 'number') {
        throw new PowerTagValueError(`${topic}: payload.tag must be a unit ID`);
    }
    assertUnitId(tag);
    return tag;
}

function requireText(payload: Record<string, unknown>, field: string, topic: string): string {
    const value = payload[field];
    if (typeof value !== 'string') {
        throw new PowerTagValueError(`${topic}: payload.${field} must be a string`);
    }
    return value;
}

function parseTagList(value: unknown): number[] | undefined {
    if (value === undefined) return undefined;
    if (typeof value === 'string') return parseUnitIds(value);
    if (Array.isArray(value) && value.every((v): v is number => typeof v === 'number')) {
        value.forEach(assertUnitId);
        return value;
    }
    throw new PowerTagValueError('payload.tags must be a list of unit IDs or a string like "1-3,7"');
}

/**
 * Turn a Node-RED message into a gateway command.
 * Unknown topics are reads, so any inject node triggers a poll.
 *
 * @throws {PowerTagValueError} If a write command's payload is incomplete
 */
export function parseCommand(topic: string | undefined, payload: unknown): GatewayCommand {
    switch (topic) {
        case 'reset-peak-demands': {
            if (!isRecord(payload)) throw new PowerTagValueError(`${topic}: payload must be an object`);
            return { kind: topic, tag: requireTag(payload, topic) };
        }
        case 'set-name': {
            if (!isRecord(payload)) throw new PowerTagValueError(`${topic}: payload must be an object`);
            return { kind: topic, tag: requireTag(payload, topic), name: requireText(payload, 'name', topic) };
        }
        case 'set-circuit': {
            if (!isRecord(payload)) throw new PowerTagValueError(`${topic}: payload must be an object`);
            return { kind: topic, tag: requireTag(payload, topic), circuit: requireText(payload, 'circuit', topic) };
        }
        default:
            return { kind: 'read', tags: isRecord(payload) ? parseTagList(payload.tags) : undefined };
    }
}

/**
 * Run a command; reads resolve to a snapshot, writes to null
 */
export async function executeCommand(gateway: PowerTagGateway, command: GatewayCommand, options: ExecuteOptions): Promise<ReadResult | null> {
    switch (command.kind) {
        case 'reset-peak-demands':
            await gateway.resetTagPeakDemands(command.tag);
            return null;
        case 'set-name':
            await gateway.setTagName(command.tag, command.name);
            return null;
        case 'set-circuit':
            await gateway.setTagCircuit(command.tag, command.circuit);
            return null;
        case 'read': {
            const result: ReadResult = {
                gateway: await readGatewaySnapshot(gateway),
                tags: {}
            };
            for (const tag of command.tags ?? options.tags) {
                result.tags[tag] = await readTagSnapshot(gateway, tag, { includeIdentity: options.includeIdentity });
            }
            return result;
        }
    }
}
