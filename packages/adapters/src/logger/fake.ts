import { type LogFields, type LogLevel, type Logger } from '@concierge/core';

export interface FakeLogEntry {
    level: LogLevel;
    obj?: LogFields;
    msg?: string;
}

/**
 * Records every entry in memory. Child loggers share the parent's `logs`
 * array and merge their bindings into `obj`.
 */
export class FakeLogger implements Logger {
    public constructor(
        public readonly logs: FakeLogEntry[] = [],
        private readonly bindings: LogFields = {}
    ) { }

    private log(level: LogLevel, arg1: LogFields | string, arg2?: string): void {
        const hasBindings = Object.keys(this.bindings).length > 0;
        if (typeof arg1 === 'string') {
            this.logs.push(hasBindings ? { level, obj: { ...this.bindings }, msg: arg1 } : { level, msg: arg1 });
            return;
        }
        const msgProp = arg2 !== undefined ? { msg: arg2 } : {};
        this.logs.push({ level, obj: { ...this.bindings, ...arg1 }, ...msgProp });
    }

    public trace(fields: LogFields, msg?: string): void;
    public trace(msg: string): void;
    public trace(arg1: LogFields | string, arg2?: string): void {
        this.log('trace', arg1, arg2);
    }

    public debug(fields: LogFields, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg1: LogFields | string, arg2?: string): void {
        this.log('debug', arg1, arg2);
    }

    public info(fields: LogFields, msg?: string): void;
    public info(msg: string): void;
    public info(arg1: LogFields | string, arg2?: string): void {
        this.log('info', arg1, arg2);
    }

    public warn(fields: LogFields, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg1: LogFields | string, arg2?: string): void {
        this.log('warn', arg1, arg2);
    }

    public error(fields: LogFields, msg?: string): void;
    public error(msg: string): void;
    public error(arg1: LogFields | string, arg2?: string): void {
        this.log('error', arg1, arg2);
    }

    public fatal(fields: LogFields, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(arg1: LogFields | string, arg2?: string): void {
        this.log('fatal', arg1, arg2);
    }

    public child(bindings: LogFields): Logger {
        return new FakeLogger(this.logs, { ...this.bindings, ...bindings });
    }

    public messages(level?: LogLevel): string[] {
        return this.logs
            .filter((entry) => level === undefined || entry.level === level)
            .map((entry) => entry.msg ?? '');
    }
}
