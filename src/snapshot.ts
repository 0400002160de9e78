import { PowerTagDateTime, formatDateTime } from './codec';
import { AlarmStatus, DeviceUsage, LineVoltage, PanelServerStatus, Phase, PhaseSequence, Position } from './enums';
import { PowerTagGateway } from './powertag-gateway';

/*
 * JSON-safe views of a gateway and its tags, built from one facade call per
 * attribute. 64-bit counters become decimal strings, the RF ID a hex string and
 * timestamps zone-less ISO strings, so the result survives Node-RED's msg cloning.
 */

export type PhaseValues = Record<Phase, number | null>;
export type LineVoltageValues = Record<LineVoltage, number | null>;

export interface GatewaySnapshot {
    synthesisUnitId: number;
    hardwareVersion: string | null;
    serialNumber: string | null;
    firmwareVersion: string | null;
    status: PanelServerStatus;
    dateTime: string | null;
    productId: number | null;
    manufacturer: string | null;
    productCode: string | null;
    productRange: string | null;
    productModel: string | null;
    name: string | null;
    productVendorUrl: string | null;
}

export interface TagIdentity {
    name: string | null;
    circuit: string | null;
    usage: DeviceUsage;
    phaseSequence: PhaseSequence;
    position: Position;
    ratedCurrent: number | null;
    ratedVoltage: number | null;
    productType: string | null;
    productLabel: string | null;
    productCode: string | null;
    serialNumber: string | null;
    firmwareRevision: string | null;
    rfId: string | null;
}

export interface TagMeasurements {
    current: PhaseValues;
    voltage: LineVoltageValues;
    powerActive: PhaseValues;
    powerActiveTotal: number | null;
    powerApparentTotal: number | null;
    powerFactorTotal: number | null;
    /** Wh, as a decimal string since the counter can exceed Number.MAX_SAFE_INTEGER */
    energyActiveTotal: string | null;
    powerActiveDemandTotal: number | null;
    powerActiveDemandTotalMaximum: number | null;
    powerActiveDemandTotalMaximumAt: string | null;
    alarmValid: boolean | null;
    alarm: AlarmStatus;
    radioCommunicationValid: boolean | null;
    rssiTag: number | null;
    rssiGateway: number | null;
}

export interface TagSnapshot {
    unitId: number;
    identity?: TagIdentity;
    measurements: TagMeasurements;
}

export interface TagSnapshotOptions {
    /** Also read name, product and rating registers */
    includeIdentity?: boolean;
}

function toIso(dt: PowerTagDateTime | null): string | null {
    return dt === null ? null : formatDateTime(dt);
}

function toDecimal(value: bigint | null): string | null {
    return value === null ? null : value.toString(10);
}

async function perPhase(read: (phase: Phase) => Promise<number | null>): Promise<PhaseValues> {
    return { A: await read('A'), B: await read('B'), C: await read('C') };
}

async function perLineVoltage(read: (line: LineVoltage) => Promise<number | null>): Promise<LineVoltageValues> {
    return {
        A_B: await read('A_B'),
        B_C: await read('B_C'),
        C_A: await read('C_A'),
        A_N: await read('A_N'),
        B_N: await read('B_N'),
        C_N: await read('C_N')
    };
}

export async function readGatewaySnapshot(gateway: PowerTagGateway): Promise<GatewaySnapshot> {
    return {
        synthesisUnitId: gateway.synthesisUnitId,
        hardwareVersion: await gateway.hardwareVersion(),
        serialNumber: await gateway.serialNumber(),
        firmwareVersion: await gateway.firmwareVersion(),
        status: await gateway.status(),
        dateTime: toIso(await gateway.dateTime()),
        productId: await gateway.productId(),
        manufacturer: await gateway.manufacturer(),
        productCode: await gateway.productCode(),
        productRange: await gateway.productRange(),
        productModel: await gateway.productModel(),
        name: await gateway.name(),
        productVendorUrl: await gateway.productVendorUrl()
    };
}

export async function readTagIdentity(gateway: PowerTagGateway, tag: number): Promise<TagIdentity> {
    const productType = await gateway.tagProductType(tag);
    const rfId = await gateway.tagRfId(tag);
    return {
        name: await gateway.tagName(tag),
        circuit: await gateway.tagCircuit(tag),
        usage: await gateway.tagUsage(tag),
        phaseSequence: await gateway.tagPhaseSequence(tag),
        position: await gateway.tagPosition(tag),
        ratedCurrent: await gateway.tagRatedCurrent(tag),
        ratedVoltage: await gateway.tagRatedVoltage(tag),
        productType: productType ? productType.reference : null,
        productLabel: productType ? productType.label : null,
        productCode: await gateway.tagProductCode(tag),
        serialNumber: await gateway.tagSerialNumber(tag),
        firmwareRevision: await gateway.tagFirmwareRevision(tag),
        rfId: rfId === null ? null : rfId.toString(16).toUpperCase().padStart(16, '0')
    };
}

export async function readTagMeasurements(gateway: PowerTagGateway, tag: number): Promise<TagMeasurements> {
    return {
        current: await perPhase(phase => gateway.tagCurrent(tag, phase)),
        voltage: await perLineVoltage(line => gateway.tagVoltage(tag, line)),
        powerActive: await perPhase(phase => gateway.tagPowerActive(tag, phase)),
        powerActiveTotal: await gateway.tagPowerActiveTotal(tag),
        powerApparentTotal: await gateway.tagPowerApparentTotal(tag),
        powerFactorTotal: await gateway.tagPowerFactorTotal(tag),
        energyActiveTotal: toDecimal(await gateway.tagEnergyActiveTotal(tag)),
        powerActiveDemandTotal: await gateway.tagPowerActiveDemandTotal(tag),
        powerActiveDemandTotalMaximum: await gateway.tagPowerActiveDemandTotalMaximum(tag),
        powerActiveDemandTotalMaximumAt: toIso(await gateway.tagPowerActiveDemandTotalMaximumTimestamp(tag)),
        alarmValid: await gateway.tagIsAlarmValid(tag),
        alarm: await gateway.tagAlarm(tag),
        radioCommunicationValid: await gateway.tagRadioCommunicationValid(tag),
        rssiTag: await gateway.tagRadioRssiInsideTag(tag),
        rssiGateway: await gateway.tagRadioRssiInsideGateway(tag)
    };
}

export async function readTagSnapshot(gateway: PowerTagGateway, tag: number, options: TagSnapshotOptions = {}): Promise<TagSnapshot> {
    const snapshot: TagSnapshot = {
        unitId: tag,
        measurements: await readTagMeasurements(gateway, tag)
    };
    if (options.includeIdentity) {
        snapshot.identity = await readTagIdentity(gateway, tag);
    }
    return snapshot;
}
