import { type LogFields, type LogLevel, type Logger } from '@concierge/core';
import pino, { type Logger as PinoInstance } from 'pino';

export interface PinoLoggerOptions {
    level?: LogLevel | 'silent';
    prettyPrint?: boolean;
    name?: string;
}

function createPinoInstance(options: PinoLoggerOptions): PinoInstance {
    const { level = 'info', prettyPrint = false, name } = options;

    const pinoOptions: pino.LoggerOptions = {
        level
    };

    if (name) {
        pinoOptions.name = name;
    }

    if (prettyPrint) {
        pinoOptions.transport = {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        };
    }

    return pino(pinoOptions);
}

export class PinoLogger implements Logger {
    private readonly pino: PinoInstance;

    constructor(options: PinoLoggerOptions | { instance: PinoInstance } = {}) {
        this.pino = 'instance' in options ? options.instance : createPinoInstance(options);
    }

    private write(level: LogLevel, arg1: LogFields | string, arg2?: string): void {
        if (typeof arg1 === 'string') {
            this.pino[level](arg1);
        } else {
            this.pino[level](arg1, arg2);
        }
    }

    public trace(fields: LogFields, msg?: string): void;
    public trace(msg: string): void;
    public trace(arg1: LogFields | string, arg2?: string): void {
        this.write('trace', arg1, arg2);
    }

    public debug(fields: LogFields, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg1: LogFields | string, arg2?: string): void {
        this.write('debug', arg1, arg2);
    }

    public info(fields: LogFields, msg?: string): void;
    public info(msg: string): void;
    public info(arg1: LogFields | string, arg2?: string): void {
        this.write('info', arg1, arg2);
    }

    public warn(fields: LogFields, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg1: LogFields | string, arg2?: string): void {
        this.write('warn', arg1, arg2);
    }

    public error(fields: LogFields, msg?: string): void;
    public error(msg: string): void;
    public error(arg1: LogFields | string, arg2?: string): void {
        this.write('error', arg1, arg2);
    }

    public fatal(fields: LogFields, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(arg1: LogFields | string, arg2?: string): void {
        this.write('fatal', arg1, arg2);
    }

    public child(bindings: LogFields): Logger {
        return new PinoLogger({ instance: this.pino.child(bindings) });
    }
}
