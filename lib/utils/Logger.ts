// IMPORTS
// ================================================================================================
import type { Logger as ILogger, LogFunction } from 'rescue-semaphore';

// CLASS DEFINITION
// ================================================================================================
export class Logger implements ILogger {

    private functionMap : Map<LogFunction, symbol>;
    private timestampMap: Map<symbol, [number, number]>;
    private prefixMap   : Map<symbol, string>;
    private enableSubLog: boolean;

    // CONSTRUCTOR
    // --------------------------------------------------------------------------------------------
    constructor(enableSubLog = true) {
        this.functionMap = new Map();
        this.timestampMap = new Map();
        this.prefixMap = new Map();
        this.enableSubLog = enableSubLog;
    }

    // PUBLIC METHODS
    // --------------------------------------------------------------------------------------------
    start(message?: string, prefix?: string): LogFunction {
        if (message) {
            console.log(`${prefix || ''}${message}`);
        }
        const label = Symbol();
        const ts = Date.now();
        this.timestampMap.set(label, [ts, ts]);
        this.prefixMap.set(label, prefix || '');
        const log = this.log.bind(this, label);
        this.functionMap.set(log, label);
        return log;
    }

    sub(message?: string): LogFunction {
        if (this.enableSubLog) {
            return this.start(message, '  ');
        }
        else {
            return noopLog;
        }
    }

    done(log: LogFunction, message?: string): void {
        const label = this.functionMap.get(log);
        if (label === undefined) return;

        const timestamps = this.timestampMap.get(label);
        if (message && timestamps) {
            const prefix = this.prefixMap.get(label) || '';
            console.log(`${prefix}${message} in ${Date.now() - timestamps[0]} ms`);
        }
        this.functionMap.delete(log);
        this.timestampMap.delete(label);
        this.prefixMap.delete(label);
    }

    // PRIVATE METHODS
    // --------------------------------------------------------------------------------------------
    private log(label: symbol, message: string) {
        const timestamps = this.timestampMap.get(label);
        if (!timestamps) return;
        const prefix = this.prefixMap.get(label) || '';
        console.log(`${prefix}${message} in ${Date.now() - timestamps[1]} ms`);
        this.timestampMap.set(label, [timestamps[0], Date.now()]);
    }
}

// NOOP LOGGER
// ================================================================================================
const noopLog: LogFunction = () => undefined;
export const noopLogger: ILogger = {
    start   : () => noopLog,
    sub     : () => noopLog,
    done    : () => undefined
};
