import { Node, NodeAPI, NodeDef, NodeMessage } from 'node-red';
import * as CONST from './constants';
import { executeCommand, parseCommand } from './commands';
import { PowerTagGateway } from './powertag-gateway';
import { ModbusTcpTransport } from './transport';
import { parseUnitIds, retryDelay } from './utils';

interface PowerTagGatewayNodeConfig extends NodeDef {
    host: string;
    port: string;
    timeout: string;
    tags: string;
    identity?: boolean;
    pacing?: string;
}

function errorText(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export = function (RED: NodeAPI) {

    function PowerTagGatewayNode(this: Node, config: PowerTagGatewayNodeConfig) {
        RED.nodes.createNode(this, config);
        const node = this;

        const host = (config.host || '').trim();
        const port = parseInt(config.port, 10) || CONST.DEFAULT_MODBUS_PORT;
        const timeout = parseInt(config.timeout, 10) || CONST.DEFAULT_TIMEOUT;
        const tags = parseUnitIds(config.tags || '');
        const includeIdentity = config.identity === true;

        let pacing = parseFloat(config.pacing || '0');
        if (isNaN(pacing) || pacing < 0) pacing = 0;
        if (pacing > 0 && pacing < CONST.MIN_PACING_INTERVAL) {
            node.warn(`Auto-read interval ${pacing}s is too fast. Enforcing minimum ${CONST.MIN_PACING_INTERVAL}s.`);
            pacing = CONST.MIN_PACING_INTERVAL;
        }

        const transport = new ModbusTcpTransport({ host, port, timeout });
        let gateway: PowerTagGateway | null = null;
        let closing = false;

        // All work for this node runs one request at a time on a single connection
        let queue: Promise<void> = Promise.resolve();
        function enqueue<T>(action: () => Promise<T>): Promise<T> {
            const result = queue.then(action);
            queue = result.then(() => undefined, () => undefined);
            return result;
        }

        async function ensureGateway(): Promise<PowerTagGateway> {
            // The transport closes itself when the socket is lost; reconnect and locate the table again
            if (!transport.isOpen) {
                gateway = null;
                node.status({ fill: 'yellow', shape: 'ring', text: 'connecting...' });
                await transport.connect();
            }
            if (!gateway) {
                node.status({ fill: 'yellow', shape: 'dot', text: 'locating synthesis table...' });
                gateway = await PowerTagGateway.open(transport, {
                    statusCallback: msg => node.log(msg),
                    shouldStop: () => closing
                });
            }
            return gateway;
        }

        async function handle(msg: NodeMessage): Promise<NodeMessage> {
            const command = parseCommand(msg.topic, msg.payload);
            const result = await enqueue(async () => {
                const target = await ensureGateway();
                node.status({ fill: 'blue', shape: 'dot', text: command.kind === 'read' ? 'reading...' : `${command.kind}...` });
                return executeCommand(target, command, { tags, includeIdentity });
            });

            if (result) {
                msg.payload = result;
                node.status({ fill: 'green', shape: 'dot', text: `read ${Object.keys(result.tags).length} tag(s)` });
            } else {
                node.status({ fill: 'green', shape: 'dot', text: `${command.kind} done` });
            }
            return msg;
        }

        node.on('input', function (msg, send, done) {
            handle(msg).then(
                out => {
                    send(out);
                    done();
                },
                (err: unknown) => {
                    node.status({ fill: 'red', shape: 'ring', text: 'error' });
                    done(err instanceof Error ? err : new Error(errorText(err)));
                }
            );
        });

        // Auto-read with capped exponential backoff
        let retryTimeoutId: NodeJS.Timeout | null = null;
        let consecutiveErrors = 0;

        const schedule = (delay: number) => {
            if (closing) return;
            retryTimeoutId = setTimeout(() => {
                retryTimeoutId = null;
                executeRead();
            }, delay);
        };

        const executeRead = () => {
            handle({ topic: 'read' })
                .then(out => {
                    if (consecutiveErrors > 0) {
                        node.log(`Auto-read recovered after ${consecutiveErrors} failures`);
                    }
                    consecutiveErrors = 0;
                    node.send(out);
                    schedule(pacing * 1000);
                })
                .catch((err: unknown) => {
                    consecutiveErrors++;
                    node.warn(`Auto-read failed (${consecutiveErrors}x): ${errorText(err)}`);
                    node.status({ fill: 'red', shape: 'ring', text: `retrying (${consecutiveErrors}x)...` });
                    schedule(retryDelay(consecutiveErrors));
                });
        };

        if (!host) {
            node.status({ fill: 'grey', shape: 'ring', text: 'no host configured' });
        } else if (pacing > 0) {
            node.log(`Auto-read enabled: ${pacing}s`);
            executeRead();
        }

        node.on('close', function (done: () => void) {
            closing = true;
            if (retryTimeoutId) clearTimeout(retryTimeoutId);
            queue.then(() => {
                transport.close();
                done();
            }, done);
        });
    }

    RED.nodes.registerType('powertag-gateway', PowerTagGatewayNode);
};
