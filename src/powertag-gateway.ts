import * as CONST from './constants';
import {
    PowerTagDateTime,
    decodeDateTime,
    decodeFloat32,
    decodeString,
    decodeUint16,
    decodeUint32,
    decodeUint64,
    decodeWord,
    encodeString,
    encodeUint16
} from './codec';
import { SynthesisScanOptions, findSynthesisTableUnitId } from './discovery';
import {
    AlarmStatus,
    DeviceUsage,
    LineVoltage,
    PanelServerStatus,
    Phase,
    PhaseSequence,
    Position,
    ProductType,
    decodeAlarmStatus,
    decodeDeviceUsage,
    decodePanelServerStatus,
    decodePhaseSequence,
    decodePosition,
    findProductType
} from './enums';
import { RegisterAttribute, RegisterDefinition, getRegister, resolveRegister } from './register-map';
import { RegisterTransport } from './transport';
import { assertUnitId } from './utils';

type RegisterIndexValue = Phase | LineVoltage | number;

/**
 * Typed access to a PowerTag Link / Panel Server gateway and its wireless tags.
 *
 * Every accessor issues exactly one read or write on the transport. Tags are
 * addressed by their Modbus unit ID. `null` means the device reported the
 * value as not available.
 */
export class PowerTagGateway {
    readonly transport: RegisterTransport;
    readonly synthesisUnitId: number;

    constructor(transport: RegisterTransport, synthesisUnitId: number) {
        assertUnitId(synthesisUnitId);
        this.transport = transport;
        this.synthesisUnitId = synthesisUnitId;
    }

    /**
     * Resolve the synthesis table and return a gateway bound to it
     *
     * @throws {PowerTagSynthesisTableNotFoundError} If no unit in 247..2 answers
     */
    static async open(transport: RegisterTransport, options?: SynthesisScanOptions): Promise<PowerTagGateway> {
        const unitId = await findSynthesisTableUnitId(transport, options);
        return new PowerTagGateway(transport, unitId);
    }

    // --- Gateway identification ---

    /** Valid for firmware 001.008.007 and later */
    hardwareVersion(): Promise<string | null> {
        return this.readString('hardwareVersion', CONST.GATEWAY_UNIT_ID);
    }

    /** Format: PP YY WW [D [nnnn]] (plant, year, week, day of week, sequence) */
    serialNumber(): Promise<string | null> {
        return this.readString('serialNumber', CONST.GATEWAY_UNIT_ID);
    }

    firmwareVersion(): Promise<string | null> {
        return this.readString('firmwareVersion', CONST.GATEWAY_UNIT_ID);
    }

    async status(): Promise<PanelServerStatus> {
        return decodePanelServerStatus(decodeWord(await this.read('status', CONST.GATEWAY_UNIT_ID), 'status'));
    }

    /** Gateway clock, device-local time */
    async dateTime(): Promise<PowerTagDateTime | null> {
        return decodeDateTime(await this.read('dateTime', CONST.GATEWAY_UNIT_ID));
    }

    // --- Metering ---

    async tagCurrent(tag: number, phase: Phase): Promise<number | null> {
        return decodeFloat32(await this.read('tagCurrent', tag, phase));
    }

    async tagVoltage(tag: number, lineVoltage: LineVoltage): Promise<number | null> {
        return decodeFloat32(await this.read('tagVoltage', tag, lineVoltage));
    }

    async tagPowerActive(tag: number, phase: Phase): Promise<number | null> {
        return decodeFloat32(await this.read('tagPowerActive', tag, phase));
    }

    async tagPowerActiveTotal(tag: number): Promise<number | null> {
        return decodeFloat32(await this.read('tagPowerActiveTotal', tag));
    }

    /** Arithmetic sum over phases */
    async tagPowerApparentTotal(tag: number): Promise<number | null> {
        return decodeFloat32(await this.read('tagPowerApparentTotal', tag));
    }

    async tagPowerFactorTotal(tag: number): Promise<number | null> {
        return decodeFloat32(await this.read('tagPowerFactorTotal', tag));
    }

    // --- Energy ---

    /** Active energy delivered + received in Wh, not resettable */
    async tagEnergyActiveTotal(tag: number): Promise<bigint | null> {
        return decodeUint64(await this.read('tagEnergyActiveTotal', tag));
    }

    /**
     * Active energy delivered + received in Wh, resettable.
     * Reads the same register as the total counter; unconfirmed against device documentation.
     */
    async tagEnergyActivePartial(tag: number): Promise<bigint | null> {
        return decodeUint64(await this.read('tagEnergyActivePartial', tag));
    }

    // --- Demand ---

    async tagPowerActiveDemandTotal(tag: number): Promise<number | null> {
        return decodeFloat32(await this.read('tagPowerActiveDemandTotal', tag));
    }

    async tagPowerActiveDemandTotalMaximum(tag: number): Promise<number | null> {
        return decodeFloat32(await this.read('tagPowerActiveDemandTotalMaximum', tag));
    }

    async tagPowerActiveDemandTotalMaximumTimestamp(tag: number): Promise<PowerTagDateTime | null> {
        return decodeDateTime(await this.read('tagPowerActiveDemandTotalMaximumTimestamp', tag));
    }

    // --- Alarms ---

    /** Whether the alarm bitmap can be trusted */
    async tagIsAlarmValid(tag: number): Promise<boolean | null> {
        const value = decodeUint16(await this.read('tagAlarmValidity', tag));
        return value === null ? null : (value & 0b1) !== 0;
    }

    async tagAlarm(tag: number): Promise<AlarmStatus> {
        return decodeAlarmStatus(decodeWord(await this.read('tagAlarm', tag)));
    }

    /** Last RMS current measured when the voltage loss occurred */
    async tagCurrentAtVoltageLoss(tag: number, phase: Phase): Promise<number | null> {
        return decodeFloat32(await this.read('tagCurrentAtVoltageLoss', tag, phase));
    }

    // --- Load operating time ---

    async tagLoadOperatingTime(tag: number): Promise<number | null> {
        return decodeUint32(await this.read('tagLoadOperatingTime', tag));
    }

    /** The counter runs while active power is above this threshold */
    async tagLoadOperatingTimeActivePowerThreshold(tag: number): Promise<number | null> {
        return decodeFloat32(await this.read('tagLoadOperatingTimeActivePowerThreshold', tag));
    }

    /** Last set or reset of the load operating time counter */
    async tagLoadOperatingTimeStart(tag: number): Promise<PowerTagDateTime | null> {
        return decodeDateTime(await this.read('tagLoadOperatingTimeStart', tag));
    }

    // --- Configuration ---

    /** User application name, at most 20 characters */
    tagName(tag: number): Promise<string | null> {
        return this.readString('tagName', tag);
    }

    setTagName(tag: number, name: string): Promise<void> {
        return this.writeString('tagName', tag, name);
    }

    /** Circuit identifier, at most 5 characters */
    tagCircuit(tag: number): Promise<string | null> {
        return this.readString('tagCircuit', tag);
    }

    setTagCircuit(tag: number, circuit: string): Promise<void> {
        return this.writeString('tagCircuit', tag, circuit);
    }

    async tagUsage(tag: number): Promise<DeviceUsage> {
        return decodeDeviceUsage(decodeWord(await this.read('tagUsage', tag), 'enum16'));
    }

    async tagPhaseSequence(tag: number): Promise<PhaseSequence> {
        return decodePhaseSequence(decodeWord(await this.read('tagPhaseSequence', tag), 'enum16'));
    }

    /** Mounting position */
    async tagPosition(tag: number): Promise<Position> {
        return decodePosition(decodeWord(await this.read('tagPosition', tag), 'enum16'));
    }

    async tagCircuitDiagnostic(tag: number): Promise<Position> {
        return decodePosition(decodeWord(await this.read('tagCircuitDiagnostic', tag), 'enum16'));
    }

    /** Rated current of the protective device */
    async tagRatedCurrent(tag: number): Promise<number | null> {
        return decodeUint16(await this.read('tagRatedCurrent', tag));
    }

    async tagRatedVoltage(tag: number): Promise<number | null> {
        return decodeFloat32(await this.read('tagRatedVoltage', tag));
    }

    resetTagPeakDemands(tag: number): Promise<void> {
        return this.write('tagResetPeakDemands', tag, encodeUint16(CONST.RESET_PEAK_DEMANDS_COMMAND));
    }

    async tagPowerSupplyType(tag: number): Promise<Position> {
        return decodePosition(decodeWord(await this.read('tagPowerSupplyType', tag), 'enum16'));
    }

    // --- Device identification ---

    /** Wireless device code type; null for an unknown or unavailable code */
    async tagProductType(tag: number): Promise<ProductType | null> {
        return findProductType(decodeUint16(await this.read('tagProductType', tag)));
    }

    /** Virtual Modbus server address */
    async tagSlaveAddress(tag: number): Promise<number | null> {
        return decodeUint16(await this.read('tagSlaveAddress', tag));
    }

    async tagRfId(tag: number): Promise<bigint | null> {
        return decodeUint64(await this.read('tagRfId', tag));
    }

    async tagProductIdentifier(tag: number): Promise<number | null> {
        return decodeUint16(await this.read('tagProductIdentifier', tag));
    }

    tagVendorName(tag: number): Promise<string | null> {
        return this.readString('tagVendorName', tag);
    }

    /** Commercial reference */
    tagProductCode(tag: number): Promise<string | null> {
        return this.readString('tagProductCode', tag);
    }

    tagFirmwareRevision(tag: number): Promise<string | null> {
        return this.readString('tagFirmwareRevision', tag);
    }

    tagHardwareRevision(tag: number): Promise<string | null> {
        return this.readString('tagHardwareRevision', tag);
    }

    tagSerialNumber(tag: number): Promise<string | null> {
        return this.readString('tagSerialNumber', tag);
    }

    tagProductRange(tag: number): Promise<string | null> {
        return this.readString('tagProductRange', tag);
    }

    tagProductModel(tag: number): Promise<string | null> {
        return this.readString('tagProductModel', tag);
    }

    tagProductFamily(tag: number): Promise<string | null> {
        return this.readString('tagProductFamily', tag);
    }

    // --- Radio diagnostics ---

    /** RF communication between the tag and the gateway */
    async tagRadioCommunicationValid(tag: number): Promise<boolean | null> {
        const value = decodeUint16(await this.read('tagRadioCommunicationValid', tag));
        return value === null ? null : value !== 0;
    }

    async tagWirelessCommunicationValid(tag: number): Promise<boolean | null> {
        const value = decodeUint16(await this.read('tagWirelessCommunicationValid', tag));
        return value === null ? null : value !== 0;
    }

    /** Packet error rate of the tag, as received by the gateway */
    async tagRadioPerTag(tag: number): Promise<number | null> {
        return decodeFloat32(await this.read('tagRadioPerTag', tag));
    }

    async tagRadioRssiInsideTag(tag: number): Promise<number | null> {
        return decodeFloat32(await this.read('tagRadioRssiInsideTag', tag));
    }

    async tagRadioLqiTag(tag: number): Promise<number | null> {
        return decodeUint16(await this.read('tagRadioLqiTag', tag));
    }

    async tagRadioPerGateway(tag: number): Promise<number | null> {
        return decodeFloat32(await this.read('tagRadioPerGateway', tag));
    }

    async tagRadioRssiInsideGateway(tag: number): Promise<number | null> {
        return decodeFloat32(await this.read('tagRadioRssiInsideGateway', tag));
    }

    async tagRadioLqiGateway(tag: number): Promise<number | null> {
        return decodeUint16(await this.read('tagRadioLqiGateway', tag));
    }

    async tagRadioPerMaximum(tag: number): Promise<number | null> {
        return decodeFloat32(await this.read('tagRadioPerMaximum', tag));
    }

    async tagRadioRssiMinimum(tag: number): Promise<number | null> {
        return decodeFloat32(await this.read('tagRadioRssiMinimum', tag));
    }

    async tagRadioLqiMinimum(tag: number): Promise<number | null> {
        return decodeUint16(await this.read('tagRadioLqiMinimum', tag));
    }

    // --- Synthesis table ---

    async productId(): Promise<number | null> {
        return decodeUint16(await this.read('productId', this.synthesisUnitId));
    }

    manufacturer(): Promise<string | null> {
        return this.readString('manufacturer', this.synthesisUnitId);
    }

    /** Commercial reference of the gateway */
    productCode(): Promise<string | null> {
        return this.readString('productCode', this.synthesisUnitId);
    }

    productRange(): Promise<string | null> {
        return this.readString('productRange', this.synthesisUnitId);
    }

    productModel(): Promise<string | null> {
        return this.readString('productModel', this.synthesisUnitId);
    }

    /** Asset name */
    name(): Promise<string | null> {
        return this.readString('name', this.synthesisUnitId);
    }

    productVendorUrl(): Promise<string | null> {
        return this.readString('productVendorUrl', this.synthesisUnitId);
    }

    /** Unit ID of the wireless device configured in `slot` (1..100) */
    async modbusAddressOfNode(slot: number): Promise<number | null> {
        return decodeUint16(await this.read('modbusAddressOfNode', this.synthesisUnitId, slot));
    }

    // --- Helpers ---

    private async read(attribute: RegisterAttribute, unitId: number, index?: RegisterIndexValue): Promise<number[]> {
        assertUnitId(unitId);
        const reg = resolveRegister(attribute, index);
        return this.transport.readRegisters(reg.address, reg.count, unitId);
    }

    private async write(attribute: RegisterAttribute, unitId: number, words: number[]): Promise<void> {
        assertUnitId(unitId);
        if (!getRegister(attribute).writable) {
            throw new Error(`Register ${attribute} is read-only`);
        }
        const reg = resolveRegister(attribute);
        await this.transport.writeRegisters(reg.address, unitId, words);
    }

    private async readString(attribute: RegisterAttribute, unitId: number): Promise<string | null> {
        const def = this.stringRegister(attribute);
        return decodeString(await this.read(attribute, unitId), def.count, def.maxLength);
    }

    private async writeString(attribute: RegisterAttribute, unitId: number, value: string): Promise<void> {
        const def = this.stringRegister(attribute);
        await this.write(attribute, unitId, encodeString(value, def.count, def.maxLength));
    }

    private stringRegister(attribute: RegisterAttribute): RegisterDefinition {
        const def = getRegister(attribute);
        if (def.type !== 'string') {
            throw new Error(`Register ${attribute} is ${def.type}, not string`);
        }
        return def;
    }
}
