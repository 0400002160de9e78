/**
 * Custom Error Classes for PowerTag Gateway Operations
 * Lets callers tell a transport failure, a device exception and a decode failure apart
 */

/**
 * Error thrown when the connection to the gateway fails or drops
 */
export class PowerTagTransportError extends Error {
    public cause: unknown;

    constructor(message: string, cause?: unknown) {
        super(message);
        this.name = 'PowerTagTransportError';
        this.cause = cause;
    }
}

/**
 * Error thrown when an operation times out
 */
export class PowerTagTimeoutError extends PowerTagTransportError {
    public operation: string;
    public timeout: number;

    constructor(operation: string, timeout: number) {
        super(`Operation "${operation}" timed out after ${timeout}ms`);
        this.name = 'PowerTagTimeoutError';
        this.operation = operation;
        this.timeout = timeout;
    }
}

/**
 * Error thrown when a request finds the connection closed, or loses it
 */
export class PowerTagConnectionClosedError extends PowerTagTransportError {
    constructor(message: string, cause?: unknown) {
        super(message, cause);
        this.name = 'PowerTagConnectionClosedError';
    }
}

/**
 * Error thrown when the device answers with a Modbus exception response
 */
export class PowerTagDeviceExceptionError extends Error {
    public modbusCode: number;
    public address: number;
    public unitId: number;

    constructor(modbusCode: number, address: number, unitId: number, message: string) {
        super(`Device exception ${modbusCode} at register 0x${address.toString(16).toUpperCase()} (unit ${unitId}): ${message}`);
        this.name = 'PowerTagDeviceExceptionError';
        this.modbusCode = modbusCode;
        this.address = address;
        this.unitId = unitId;
    }
}

/**
 * Error thrown when a register sequence does not fit the wire type
 */
export class PowerTagMalformedResponseError extends Error {
    public expected: number;
    public actual: number;

    constructor(wireType: string, expected: number, actual: number, detail?: string) {
        super(`Malformed ${wireType} response: expected ${expected} register(s), got ${actual}${detail ? ` (${detail})` : ''}`);
        this.name = 'PowerTagMalformedResponseError';
        this.expected = expected;
        this.actual = actual;
    }
}

/**
 * Error thrown when a closed enumeration receives a code it does not define
 */
export class PowerTagUnknownEnumCodeError extends Error {
    public enumName: string;
    public code: number;

    constructor(enumName: string, code: number) {
        super(`Unknown ${enumName} code ${code}`);
        this.name = 'PowerTagUnknownEnumCodeError';
        this.enumName = enumName;
        this.code = code;
    }
}

export interface DateTimeFields {
    year: number;
    month: number;
    day: number;
    hour: number;
    minute: number;
    second: number;
    millisecond: number;
}

/**
 * Error thrown when a packed date-time holds out-of-range calendar fields
 */
export class PowerTagInvalidTimestampError extends Error {
    public fields: DateTimeFields;

    constructor(fields: DateTimeFields) {
        const { year, month, day, hour, minute, second, millisecond } = fields;
        super(`Invalid timestamp ${year}-${month}-${day} ${hour}:${minute}:${second}.${millisecond}`);
        this.name = 'PowerTagInvalidTimestampError';
        this.fields = fields;
    }
}

/**
 * Error thrown when no unit ID in the probe range answers as the synthesis table
 */
export class PowerTagSynthesisTableNotFoundError extends Error {
    public from: number;
    public to: number;

    constructor(from: number, to: number) {
        super(`Synthesis table not found on unit IDs ${from}..${to}`);
        this.name = 'PowerTagSynthesisTableNotFoundError';
        this.from = from;
        this.to = to;
    }
}

/**
 * Error thrown when a request targets a unit ID outside 1..247 and 255
 */
export class PowerTagUnitIdError extends Error {
    public unitId: number;

    constructor(unitId: number) {
        super(`Invalid unit ID ${unitId}: expected 1..247 or 255`);
        this.name = 'PowerTagUnitIdError';
        this.unitId = unitId;
    }
}

/**
 * Error thrown when a value cannot be encoded into its register type
 */
export class PowerTagValueError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PowerTagValueError';
    }
}
