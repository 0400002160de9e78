/**
 * Enumerated Domain Types
 * Raw register codes mapped to named device states
 */

import * as CONST from './constants';
import { PowerTagUnknownEnumCodeError } from './errors';

// Register offsets inside a per-phase block (one float32 per phase)
export const PHASE_OFFSETS = {
    A: 0,
    B: 2,
    C: 4
} as const;

export type Phase = keyof typeof PHASE_OFFSETS;

export const LINE_VOLTAGE_OFFSETS = {
    A_B: 0,
    B_C: 2,
    C_A: 4,
    A_N: 8,
    B_N: 10,
    C_N: 12
} as const;

export type LineVoltage = keyof typeof LINE_VOLTAGE_OFFSETS;

export function isPhase(value: unknown): value is Phase {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(PHASE_OFFSETS, value);
}

export function isLineVoltage(value: unknown): value is LineVoltage {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LINE_VOLTAGE_OFFSETS, value);
}

/** Marks the device's own "invalid" code, as opposed to a value that is not available */
export const INVALID = 'INVALID';
export type Invalid = typeof INVALID;

export const DEVICE_USAGE_CODES = {
    main_incomer: 1,
    sub_head_of_group: 2,
    heating: 3,
    cooling: 4,
    hvac: 5,
    ventilation: 6,
    lighting: 7,
    office_equipment: 8,
    cooking: 9,
    food_refrigeration: 10,
    elevators: 11,
    computers: 12,
    renewable_energy_production: 13,
    genset: 14,
    compressed_air: 15,
    vapor: 16,
    machine: 17,
    process: 18,
    water: 19,
    other_sockets: 20,
    other: 21
} as const;

export type DeviceUsage = keyof typeof DEVICE_USAGE_CODES | Invalid;

export const PHASE_SEQUENCE_CODES = {
    A: 1,
    B: 2,
    C: 3,
    ABC: 4,
    ACB: 5,
    BCA: 6,
    BAC: 7,
    CAB: 8,
    CBA: 9
} as const;

export type PhaseSequence = keyof typeof PHASE_SEQUENCE_CODES | Invalid;

export const POSITION_CODES = {
    not_configured: 0,
    top: 1,
    bottom: 2,
    not_applicable: 3
} as const;

export type Position = keyof typeof POSITION_CODES | Invalid;

// Panel Server status differs from the legacy PowerTag Link diagnostic bitmap
export const PANEL_SERVER_STATUS_CODES = {
    nominal: 0b0000,
    degraded: 0b0001,
    out_of_order: 0b0010
} as const;

export type PanelServerStatus = keyof typeof PANEL_SERVER_STATUS_CODES;

function lookupCode<K extends string>(table: Record<K, number>, code: number): K | undefined {
    for (const key in table) {
        if (table[key] === code) return key;
    }
    return undefined;
}

/**
 * Closed enumeration whose device map reserves 0xFFFF as "invalid".
 * Any other unlisted code is a decode failure.
 */
function decodeWithInvalid<K extends string>(enumName: string, table: Record<K, number>, code: number): K | Invalid {
    if (code === CONST.UINT16_NOT_AVAILABLE) return INVALID;
    const key = lookupCode(table, code);
    if (key === undefined) throw new PowerTagUnknownEnumCodeError(enumName, code);
    return key;
}

export function decodeDeviceUsage(code: number): DeviceUsage {
    return decodeWithInvalid('DeviceUsage', DEVICE_USAGE_CODES, code);
}

export function decodePhaseSequence(code: number): PhaseSequence {
    return decodeWithInvalid('PhaseSequence', PHASE_SEQUENCE_CODES, code);
}

export function decodePosition(code: number): Position {
    return decodeWithInvalid('Position', POSITION_CODES, code);
}

export function decodePanelServerStatus(code: number): PanelServerStatus {
    const key = lookupCode(PANEL_SERVER_STATUS_CODES, code);
    if (key === undefined) throw new PowerTagUnknownEnumCodeError('PanelServerStatus', code);
    return key;
}

export interface ProductType {
    reference: string;
    code: number;
    label: string;
}

/**
 * Wireless device code types, searched by code.
 * New products can show up before this table knows them.
 */
export const PRODUCT_TYPES: readonly ProductType[] = [
    { reference: 'A9MEM1520', code: 41, label: 'PowerTag M63 1P' },
    { reference: 'A9MEM1521', code: 42, label: 'PowerTag M63 1P+N Top' },
    { reference: 'A9MEM1522', code: 43, label: 'PowerTag M63 1P+N Bottom' },
    { reference: 'A9MEM1540', code: 44, label: 'PowerTag M63 3P' },
    { reference: 'A9MEM1541', code: 45, label: 'PowerTag M63 3P+N Top' },
    { reference: 'A9MEM1542', code: 46, label: 'PowerTag M63 3P+N Bottom' },
    { reference: 'A9MEM1560', code: 81, label: 'PowerTag F63 1P+N' },
    { reference: 'A9MEM1561', code: 82, label: 'PowerTag P63 1P+N Top' },
    { reference: 'A9MEM1562', code: 83, label: 'PowerTag P63 1P+N Bottom' },
    { reference: 'A9MEM1563', code: 84, label: 'PowerTag P63 1P+N Bottom' },
    { reference: 'A9MEM1570', code: 85, label: 'PowerTag F63 3P+N' },
    { reference: 'A9MEM1571', code: 86, label: 'PowerTag P63 3P+N Top' },
    { reference: 'A9MEM1572', code: 87, label: 'PowerTag P63 3P+N Bottom' },
    { reference: 'LV434020', code: 92, label: 'PowerTag M250 3P' },
    { reference: 'LV434021', code: 93, label: 'PowerTag M250 4P' },
    { reference: 'LV434022', code: 94, label: 'PowerTag M630 3P' },
    { reference: 'LV434023', code: 95, label: 'PowerTag M630 4P' },
    { reference: 'A9MEM1543', code: 96, label: 'PowerTag M63 3P 230 V' },
    { reference: 'A9XMC2D3', code: 97, label: 'PowerTag C 2DI 230 V' },
    { reference: 'A9XMC1D3', code: 98, label: 'PowerTag C IO 230 V' },
    { reference: 'A9MEM1564', code: 101, label: 'PowerTag F63 1P+N 110 V' },
    { reference: 'A9MEM1573', code: 102, label: 'PowerTag F63 3P' },
    { reference: 'A9MEM1574', code: 103, label: 'PowerTag F63 3P+N 110/230 V' },
    { reference: 'A9MEM1590', code: 104, label: 'PowerTag R200' },
    { reference: 'A9MEM1591', code: 105, label: 'PowerTag R600' },
    { reference: 'A9MEM1592', code: 106, label: 'PowerTag R1000' },
    { reference: 'A9MEM1593', code: 107, label: 'PowerTag R2000' },
    { reference: 'A9MEM1580', code: 121, label: 'PowerTag F160' },
    { reference: 'A9XMWRD', code: 170, label: 'PowerTag Link display' },
    { reference: 'SMT10020', code: 171, label: 'HeatTag sensor' }
];

export function findProductType(code: number | null): ProductType | null {
    if (code === null) return null;
    return PRODUCT_TYPES.find(p => p.code === code) ?? null;
}

export interface AlarmStatus {
    hasAlarm: boolean;
    voltageLoss: boolean;
    currentOverload: boolean;
    overload45Percent: boolean;
    loadCurrentLoss: boolean;
    overvoltage: boolean;
    undervoltage: boolean;
    heatTagAlarm: boolean;
    heatTagMaintenance: boolean;
    heatTagReplacement: boolean;
}

export const ALARM_BITS = {
    voltageLoss: 0b0000_0000_0001,
    currentOverload: 0b0000_0000_0010,
    // bit 2 reserved
    overload45Percent: 0b0000_0000_1000,
    loadCurrentLoss: 0b0000_0001_0000,
    overvoltage: 0b0000_0010_0000,
    undervoltage: 0b0000_0100_0000,
    heatTagAlarm: 0b0001_0000_0000,
    heatTagMaintenance: 0b0100_0000_0000,
    heatTagReplacement: 0b1000_0000_0000
} as const;

export function decodeAlarmStatus(bitmap: number): AlarmStatus {
    const flag = (bit: number) => (bitmap & bit) !== 0;
    const flags = {
        voltageLoss: flag(ALARM_BITS.voltageLoss),
        currentOverload: flag(ALARM_BITS.currentOverload),
        overload45Percent: flag(ALARM_BITS.overload45Percent),
        loadCurrentLoss: flag(ALARM_BITS.loadCurrentLoss),
        overvoltage: flag(ALARM_BITS.overvoltage),
        undervoltage: flag(ALARM_BITS.undervoltage),
        heatTagAlarm: flag(ALARM_BITS.heatTagAlarm),
        heatTagMaintenance: flag(ALARM_BITS.heatTagMaintenance),
        heatTagReplacement: flag(ALARM_BITS.heatTagReplacement)
    };
    return {
        // Reserved bits 2, 7 and 9 never raise hasAlarm
        hasAlarm: Object.values(flags).some(Boolean),
        ...flags
    };
}
