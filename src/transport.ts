import ModbusRTU from 'modbus-serial';
import * as CONST from './constants';
import { PowerTagConnectionClosedError, PowerTagDeviceExceptionError, PowerTagTransportError } from './errors';
import { formatHex, withTimeout } from './utils';

/**
 * Synchronous request/response access to holding registers.
 * Callers serialize their requests; implementations do no queueing or retries.
 */
export interface RegisterTransport {
    readRegisters(address: number, count: number, unitId: number): Promise<number[]>;
    writeRegisters(address: number, unitId: number, words: number[]): Promise<void>;
}

export interface ModbusTcpTransportOptions {
    host: string;
    port?: number;
    /** Per-request timeout in ms */
    timeout?: number;
    connectTimeout?: number;
}

/**
 * Errors that mean the socket is gone. A request timeout is not one of them:
 * gateways stay silent for unit IDs nobody answers to.
 */
const FATAL_ERRORS = ['ECONNRESET', 'EPIPE', 'ECONNREFUSED', 'Port Not Open'];

function getModbusCode(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'modbusCode' in error && typeof error.modbusCode === 'number') {
        return error.modbusCode;
    }
    return undefined;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function isFatalError(error: unknown): boolean {
    const message = errorMessage(error);
    return FATAL_ERRORS.some(e => message.includes(e));
}

/**
 * Modbus TCP transport over a single modbus-serial client.
 * One connection is opened by connect() and reused until close().
 */
export class ModbusTcpTransport implements RegisterTransport {
    private client: ModbusRTU | null = null;
    private readonly host: string;
    private readonly port: number;
    private readonly timeout: number;
    private readonly connectTimeout: number;

    constructor(options: ModbusTcpTransportOptions) {
        this.host = options.host;
        this.port = options.port ?? CONST.DEFAULT_MODBUS_PORT;
        this.timeout = options.timeout ?? CONST.DEFAULT_TIMEOUT;
        this.connectTimeout = options.connectTimeout ?? CONST.CONNECTION_TIMEOUT;
    }

    get isOpen(): boolean {
        return this.client !== null && this.client.isOpen;
    }

    async connect(): Promise<void> {
        if (this.isOpen) return;

        const client = new ModbusRTU();
        client.setTimeout(this.timeout);
        try {
            await withTimeout(client.connectTCP(this.host, { port: this.port }), this.connectTimeout, `connect ${this.host}:${this.port}`);
        } catch (e) {
            closeQuietly(client);
            if (e instanceof PowerTagTransportError) throw e;
            throw new PowerTagTransportError(`Connection failed to ${this.host}:${this.port}: ${errorMessage(e)}`, e);
        }
        this.client = client;
    }

    close(): void {
        if (this.client) {
            closeQuietly(this.client);
            this.client = null;
        }
    }

    async readRegisters(address: number, count: number, unitId: number): Promise<number[]> {
        const client = this.requireClient();
        try {
            client.setID(unitId);
            const result = await client.readHoldingRegisters(address, count);
            return result.data;
        } catch (e) {
            throw this.translateError(e, address, unitId, 'read');
        }
    }

    async writeRegisters(address: number, unitId: number, words: number[]): Promise<void> {
        const client = this.requireClient();
        try {
            client.setID(unitId);
            await client.writeRegisters(address, words);
        } catch (e) {
            throw this.translateError(e, address, unitId, 'write');
        }
    }

    private requireClient(): ModbusRTU {
        if (!this.client || !this.client.isOpen) {
            throw new PowerTagConnectionClosedError(`Not connected to ${this.host}:${this.port}`);
        }
        return this.client;
    }

    private translateError(error: unknown, address: number, unitId: number, operation: string): Error {
        const modbusCode = getModbusCode(error);
        if (modbusCode !== undefined) {
            return new PowerTagDeviceExceptionError(modbusCode, address, unitId, errorMessage(error));
        }
        const message = `${operation} ${formatHex(address)} on unit ${unitId} failed (${this.host}:${this.port}): ${errorMessage(error)}`;
        if (isFatalError(error)) {
            this.close();
            return new PowerTagConnectionClosedError(message, error);
        }
        return new PowerTagTransportError(message, error);
    }
}

function closeQuietly(client: ModbusRTU): void {
    try {
        client.close(() => undefined);
    } catch (e) {
        console.warn('[PowerTag] Error while closing connection:', errorMessage(e));
    }
}
