/**
 * PowerTag Register Map
 * Address, width and wire type of every attribute exposed by the gateway,
 * its synthesis table and the wireless tags. Addresses are 0-based holding
 * registers (function code 3) and must match the device map exactly.
 */

import * as CONST from './constants';
import { PowerTagValueError } from './errors';
import { LINE_VOLTAGE_OFFSETS, LineVoltage, PHASE_OFFSETS, Phase, isLineVoltage, isPhase } from './enums';

export type WireType = 'uint16' | 'uint32' | 'uint64' | 'float32' | 'string' | 'datetime' | 'bitmap' | 'enum16';

/** Which unit answers: the gateway (255), a tag (its own unit ID) or the synthesis table */
export type RegisterTarget = 'gateway' | 'tag' | 'synthesis';

export type RegisterIndex = 'phase' | 'lineVoltage' | 'slot';

export interface RegisterDefinition {
    address: number;
    count: number;
    type: WireType;
    target: RegisterTarget;
    index?: RegisterIndex;
    /** Characters the device accepts, when shorter than the register span */
    maxLength?: number;
    writable?: boolean;
}

export interface ResolvedRegister {
    address: number;
    count: number;
    type: WireType;
}

export const REGISTERS = {
    // Gateway identification
    hardwareVersion: { address: 0x0050, count: 6, type: 'string', target: 'gateway', maxLength: 11 },
    serialNumber: { address: 0x0064, count: 6, type: 'string', target: 'gateway', maxLength: 11 },
    firmwareVersion: { address: 0x0078, count: 6, type: 'string', target: 'gateway', maxLength: 11 },
    status: { address: 0x009E, count: 1, type: 'enum16', target: 'gateway' },
    dateTime: { address: 0x0073, count: 4, type: 'datetime', target: 'gateway' },

    // Metering
    tagCurrent: { address: 0x0BB7, count: 2, type: 'float32', target: 'tag', index: 'phase' },
    tagVoltage: { address: 0x0BCB, count: 2, type: 'float32', target: 'tag', index: 'lineVoltage' },
    tagPowerActive: { address: 0x0BED, count: 2, type: 'float32', target: 'tag', index: 'phase' },
    tagPowerActiveTotal: { address: 0x0BF3, count: 2, type: 'float32', target: 'tag' },
    tagPowerApparentTotal: { address: 0x0C03, count: 2, type: 'float32', target: 'tag' },
    tagPowerFactorTotal: { address: 0x0C0B, count: 2, type: 'float32', target: 'tag' },

    // Energy (legacy zone). Total and partial share an address in the device map.
    tagEnergyActiveTotal: { address: 0x0C83, count: 4, type: 'uint64', target: 'tag' },
    tagEnergyActivePartial: { address: 0x0C83, count: 4, type: 'uint64', target: 'tag' },

    // Demand
    tagPowerActiveDemandTotal: { address: 0x0EB5, count: 2, type: 'float32', target: 'tag' },
    tagPowerActiveDemandTotalMaximum: { address: 0x0EB9, count: 2, type: 'float32', target: 'tag' },
    tagPowerActiveDemandTotalMaximumTimestamp: { address: 0x0EBB, count: 4, type: 'datetime', target: 'tag' },

    // Alarms
    tagAlarmValidity: { address: 0x0CE1, count: 1, type: 'uint16', target: 'tag' },
    tagAlarm: { address: 0x0CE3, count: 1, type: 'bitmap', target: 'tag' },
    tagCurrentAtVoltageLoss: { address: 0x0CE5, count: 2, type: 'float32', target: 'tag', index: 'phase' },

    // Load operating time
    tagLoadOperatingTime: { address: 0x0CEB, count: 2, type: 'uint32', target: 'tag' },
    tagLoadOperatingTimeActivePowerThreshold: { address: 0x0CED, count: 2, type: 'float32', target: 'tag' },
    tagLoadOperatingTimeStart: { address: 0x0CEF, count: 4, type: 'datetime', target: 'tag' },

    // Configuration
    tagName: { address: 0x7918, count: 10, type: 'string', target: 'tag', maxLength: 20, writable: true },
    tagCircuit: { address: 0x7922, count: 3, type: 'string', target: 'tag', maxLength: 5, writable: true },
    tagUsage: { address: 0x7925, count: 1, type: 'enum16', target: 'tag' },
    tagPhaseSequence: { address: 0x7926, count: 1, type: 'enum16', target: 'tag' },
    tagPosition: { address: 0x7927, count: 1, type: 'enum16', target: 'tag' },
    tagCircuitDiagnostic: { address: 0x7928, count: 1, type: 'enum16', target: 'tag' },
    tagRatedCurrent: { address: 0x7929, count: 1, type: 'uint16', target: 'tag' },
    tagRatedVoltage: { address: 0x792B, count: 2, type: 'float32', target: 'tag' },
    tagResetPeakDemands: { address: 0x792E, count: 1, type: 'uint16', target: 'tag', writable: true },
    tagPowerSupplyType: { address: 0x792F, count: 1, type: 'enum16', target: 'tag' },

    // Device identification
    tagProductType: { address: 0x7930, count: 1, type: 'uint16', target: 'tag' },
    tagSlaveAddress: { address: 0x7931, count: 1, type: 'uint16', target: 'tag' },
    tagRfId: { address: 0x7932, count: 4, type: 'uint64', target: 'tag' },
    tagProductIdentifier: { address: 0x7937, count: 1, type: 'uint16', target: 'tag' },
    tagVendorName: { address: 0x7944, count: 16, type: 'string', target: 'tag', maxLength: 32 },
    tagProductCode: { address: 0x7954, count: 16, type: 'string', target: 'tag', maxLength: 32 },
    tagFirmwareRevision: { address: 0x7964, count: 6, type: 'string', target: 'tag', maxLength: 12 },
    tagHardwareRevision: { address: 0x796A, count: 6, type: 'string', target: 'tag', maxLength: 12 },
    tagSerialNumber: { address: 0x7970, count: 10, type: 'string', target: 'tag', maxLength: 20 },
    tagProductRange: { address: 0x797A, count: 8, type: 'string', target: 'tag', maxLength: 16 },
    tagProductModel: { address: 0x7982, count: 8, type: 'string', target: 'tag', maxLength: 16 },
    tagProductFamily: { address: 0x798A, count: 8, type: 'string', target: 'tag', maxLength: 16 },

    // Radio diagnostics. Maximum/minimum read the same registers as the tag values.
    tagRadioCommunicationValid: { address: 0x79A8, count: 1, type: 'uint16', target: 'tag' },
    tagWirelessCommunicationValid: { address: 0x79A9, count: 1, type: 'uint16', target: 'tag' },
    tagRadioPerTag: { address: 0x79B4, count: 2, type: 'float32', target: 'tag' },
    tagRadioRssiInsideTag: { address: 0x79B6, count: 2, type: 'float32', target: 'tag' },
    tagRadioLqiTag: { address: 0x79B8, count: 1, type: 'uint16', target: 'tag' },
    tagRadioPerGateway: { address: 0x79AF, count: 2, type: 'float32', target: 'tag' },
    tagRadioRssiInsideGateway: { address: 0x79B1, count: 2, type: 'float32', target: 'tag' },
    tagRadioLqiGateway: { address: 0x79B3, count: 1, type: 'uint16', target: 'tag' },
    tagRadioPerMaximum: { address: 0x79B4, count: 2, type: 'float32', target: 'tag' },
    tagRadioRssiMinimum: { address: 0x79B6, count: 2, type: 'float32', target: 'tag' },
    tagRadioLqiMinimum: { address: 0x79B8, count: 1, type: 'uint16', target: 'tag' },

    // Synthesis table
    productId: { address: CONST.SYNTHESIS_PROBE_ADDRESS, count: 1, type: 'uint16', target: 'synthesis' },
    manufacturer: { address: 0x0002, count: 16, type: 'string', target: 'synthesis', maxLength: 32 },
    productCode: { address: 0x0012, count: 16, type: 'string', target: 'synthesis', maxLength: 32 },
    productRange: { address: 0x0022, count: 8, type: 'string', target: 'synthesis', maxLength: 16 },
    productModel: { address: 0x002A, count: 8, type: 'string', target: 'synthesis', maxLength: 16 },
    name: { address: 0x0032, count: 10, type: 'string', target: 'synthesis', maxLength: 20 },
    productVendorUrl: { address: 0x003C, count: 17, type: 'string', target: 'synthesis', maxLength: 34 },

    // Wireless configured devices, 100 slots numbered from 1
    modbusAddressOfNode: { address: 0x012C, count: 1, type: 'uint16', target: 'synthesis', index: 'slot' }
} satisfies Record<string, RegisterDefinition>;

export type RegisterAttribute = keyof typeof REGISTERS;

export function getRegister(attribute: RegisterAttribute): RegisterDefinition {
    return REGISTERS[attribute];
}

/**
 * Resolve an attribute to its concrete register span
 *
 * @param attribute - Register map entry
 * @param index - Phase, line voltage or node slot (1..100) for indexed entries
 * @throws {PowerTagValueError} If the index is missing or does not fit the entry
 */
export function resolveRegister(attribute: RegisterAttribute, index?: Phase | LineVoltage | number): ResolvedRegister {
    const def = getRegister(attribute);
    let address = def.address;

    switch (def.index) {
        case 'phase':
            if (!isPhase(index)) throw new PowerTagValueError(`${attribute} needs a phase (A, B, C), got ${String(index)}`);
            address += PHASE_OFFSETS[index];
            break;
        case 'lineVoltage':
            if (!isLineVoltage(index)) throw new PowerTagValueError(`${attribute} needs a line voltage, got ${String(index)}`);
            address += LINE_VOLTAGE_OFFSETS[index];
            break;
        case 'slot':
            if (typeof index !== 'number' || !Number.isInteger(index) || index < 1 || index > CONST.NODE_SLOT_COUNT) {
                throw new PowerTagValueError(`${attribute} needs a slot 1..${CONST.NODE_SLOT_COUNT}, got ${String(index)}`);
            }
            address += index - 1;
            break;
        default:
            if (index !== undefined) throw new PowerTagValueError(`${attribute} takes no index`);
    }

    return { address, count: def.count, type: def.type };
}
