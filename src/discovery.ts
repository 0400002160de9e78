import * as CONST from './constants';
import {
    PowerTagConnectionClosedError,
    PowerTagDeviceExceptionError,
    PowerTagSynthesisTableNotFoundError,
    PowerTagTransportError
} from './errors';
import { RegisterTransport } from './transport';

export interface SynthesisScanOptions {
    start?: number;
    end?: number;
    statusCallback?: (msg: string) => void;
    shouldStop?: () => boolean;
}

/**
 * Find the unit ID of the gateway's synthesis table.
 *
 * Probes the product ID register on each candidate from `start` down to `end`;
 * the first unit that answers wins. Units that time out or reply with a Modbus
 * exception are skipped; a closed connection and anything else propagate.
 *
 * @throws {PowerTagConnectionClosedError} If the connection is lost mid-scan
 * @throws {PowerTagSynthesisTableNotFoundError} If no candidate answers
 */
export async function findSynthesisTableUnitId(transport: RegisterTransport, options: SynthesisScanOptions = {}): Promise<number> {
    const start = options.start ?? CONST.SYNTHESIS_UNIT_ID_START;
    const end = options.end ?? CONST.SYNTHESIS_UNIT_ID_END;
    const { statusCallback, shouldStop } = options;

    for (let unitId = start; unitId >= end; unitId--) {
        if (shouldStop && shouldStop()) {
            throw new PowerTagSynthesisTableNotFoundError(start, unitId + 1);
        }

        try {
            await transport.readRegisters(CONST.SYNTHESIS_PROBE_ADDRESS, 1, unitId);
        } catch (e) {
            if (e instanceof PowerTagConnectionClosedError) throw e;
            if (e instanceof PowerTagTransportError || e instanceof PowerTagDeviceExceptionError) {
                continue;
            }
            throw e;
        }

        if (statusCallback) statusCallback(`Found synthesis table on unit ${unitId}`);
        return unitId;
    }

    throw new PowerTagSynthesisTableNotFoundError(start, end);
}
