import {
    INVALID,
    decodeAlarmStatus,
    decodeDeviceUsage,
    decodePanelServerStatus,
    decodePhaseSequence,
    decodePosition,
    findProductType,
    isLineVoltage,
    isPhase
} from '../src/enums';
import { PowerTagUnknownEnumCodeError } from '../src/errors';

const NO_ALARM = {
    hasAlarm: false,
    voltageLoss: false,
    currentOverload: false,
    overload45Percent: false,
    loadCurrentLoss: false,
    overvoltage: false,
    undervoltage: false,
    heatTagAlarm: false,
    heatTagMaintenance: false,
    heatTagReplacement: false
};

describe('enums', () => {
    describe('phase and line voltage guards', () => {
        test('accept only known keys', () => {
            expect(isPhase('A')).toBe(true);
            expect(isPhase('D')).toBe(false);
            expect(isPhase(0)).toBe(false);
            expect(isLineVoltage('A_N')).toBe(true);
            expect(isLineVoltage('A')).toBe(false);
            expect(isLineVoltage('toString')).toBe(false);
        });
    });

    describe('DeviceUsage', () => {
        test('maps codes to names', () => {
            expect(decodeDeviceUsage(1)).toBe('main_incomer');
            expect(decodeDeviceUsage(7)).toBe('lighting');
            expect(decodeDeviceUsage(21)).toBe('other');
        });
        test('maps 0xFFFF to INVALID', () => {
            expect(decodeDeviceUsage(0xFFFF)).toBe(INVALID);
        });
        test('rejects unlisted codes', () => {
            expect(() => decodeDeviceUsage(0)).toThrow(PowerTagUnknownEnumCodeError);
            expect(() => decodeDeviceUsage(22)).toThrow('Unknown DeviceUsage code 22');
        });
    });

    describe('PhaseSequence', () => {
        test('maps codes to names', () => {
            expect(decodePhaseSequence(1)).toBe('A');
            expect(decodePhaseSequence(4)).toBe('ABC');
            expect(decodePhaseSequence(9)).toBe('CBA');
            expect(decodePhaseSequence(0xFFFF)).toBe('INVALID');
        });
        test('rejects unlisted codes', () => {
            expect(() => decodePhaseSequence(10)).toThrow(PowerTagUnknownEnumCodeError);
        });
    });

    describe('Position', () => {
        test('maps codes to names', () => {
            expect(decodePosition(0)).toBe('not_configured');
            expect(decodePosition(1)).toBe('top');
            expect(decodePosition(2)).toBe('bottom');
            expect(decodePosition(3)).toBe('not_applicable');
            expect(decodePosition(0xFFFF)).toBe('INVALID');
        });
        test('rejects unlisted codes', () => {
            expect(() => decodePosition(4)).toThrow(PowerTagUnknownEnumCodeError);
        });
    });

    describe('PanelServerStatus', () => {
        test('maps codes to names', () => {
            expect(decodePanelServerStatus(0)).toBe('nominal');
            expect(decodePanelServerStatus(1)).toBe('degraded');
            expect(decodePanelServerStatus(2)).toBe('out_of_order');
        });
        test('has no invalid code', () => {
            expect(() => decodePanelServerStatus(0xFFFF)).toThrow(PowerTagUnknownEnumCodeError);
            expect(() => decodePanelServerStatus(3)).toThrow('Unknown PanelServerStatus code 3');
        });
        test('error carries the enum and the code', () => {
            let error: unknown;
            try {
                decodePanelServerStatus(4);
            } catch (e) {
                error = e;
            }
            expect(error).toBeInstanceOf(PowerTagUnknownEnumCodeError);
            expect(error).toMatchObject({ enumName: 'PanelServerStatus', code: 4 });
        });
    });

    describe('ProductType', () => {
        test('finds a product by code', () => {
            expect(findProductType(92)).toEqual({ reference: 'LV434020', code: 92, label: 'PowerTag M250 3P' });
            expect(findProductType(171)?.reference).toBe('SMT10020');
        });
        test('returns null for unknown or unavailable codes', () => {
            expect(findProductType(1)).toBeNull();
            expect(findProductType(null)).toBeNull();
        });
    });

    describe('AlarmStatus', () => {
        test('no bits set means no alarm', () => {
            expect(decodeAlarmStatus(0)).toEqual(NO_ALARM);
        });
        test('decodes voltage loss and overload', () => {
            expect(decodeAlarmStatus(0b11)).toEqual({
                ...NO_ALARM,
                hasAlarm: true,
                voltageLoss: true,
                currentOverload: true
            });
        });
        test('ignores the reserved bits', () => {
            expect(decodeAlarmStatus(0b100)).toEqual(NO_ALARM);
            expect(decodeAlarmStatus(0x0080)).toEqual(NO_ALARM);
            expect(decodeAlarmStatus(0x0200)).toEqual(NO_ALARM);
        });
        test('decodes the HeatTag bits from the upper byte', () => {
            expect(decodeAlarmStatus(0x0100)).toEqual({ ...NO_ALARM, hasAlarm: true, heatTagAlarm: true });
            expect(decodeAlarmStatus(0x0400)).toEqual({ ...NO_ALARM, hasAlarm: true, heatTagMaintenance: true });
            expect(decodeAlarmStatus(0x0800)).toEqual({ ...NO_ALARM, hasAlarm: true, heatTagReplacement: true });
        });
        test('decodes every named flag', () => {
            const status = decodeAlarmStatus(0b1101_0111_1011);
            expect(Object.values(status).every(Boolean)).toBe(true);
        });
    });
});
