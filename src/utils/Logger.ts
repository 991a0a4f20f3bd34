/**
 * Internal logging utility for patchbus.
 * Structured logging with levels and tags, so that embedders can
 * silence the bus or turn on per-component debugging.
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    NONE = 4
}

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

export class Logger {
    private level: LogLevel = LogLevel.INFO;
    private tag: string;
    private useJson: boolean = false;

    constructor(tag: string = 'patchbus', debug: boolean = false) {
        this.tag = tag;
        if (debug) {
            this.level = LogLevel.DEBUG;
        }
    }

    public setLogLevel(level: LogLevel): void {
        this.level = level;
    }

    public getLogLevel(): LogLevel {
        return this.level;
    }

    public setJson(enabled: boolean): void {
        this.useJson = enabled;
    }

    private log(method: ConsoleMethod, levelName: string, message: string, args: unknown[]): void {
        if (this.useJson) {
            const entry = {
                timestamp: new Date().toISOString(),
                tag: this.tag,
                level: levelName,
                message,
                data: args.length > 0 ? Logger.toViewable(args) : undefined
            };
            console[method](JSON.stringify(entry));
        } else {
            const prefix = `[${this.tag}]${levelName === 'DEBUG' ? ' (DEBUG)' : ''}${levelName === 'WARN' ? ' ⚠️' : ''}${levelName === 'ERROR' ? ' ❌' : ''}`;
            console[method](`${prefix} ${message}`, ...args);
        }
    }

    public debug(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.DEBUG) {
            this.log('debug', 'DEBUG', message, args);
        }
    }

    public info(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.INFO) {
            this.log('info', 'INFO', message, args);
        }
    }

    public warn(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.WARN) {
            this.log('warn', 'WARN', message, args);
        }
    }

    public error(message: string, ...args: unknown[]): void {
        if (this.level <= LogLevel.ERROR) {
            this.log('error', 'ERROR', message, args);
        }
    }

    /**
     * Creates a child logger with an extended tag.
     */
    public child(subTag: string): Logger {
        const child = new Logger(`${this.tag}:${subTag}`);
        child.setLogLevel(this.level);
        child.setJson(this.useJson);
        return child;
    }

    public toJSON() {
        return {
            tag: this.tag,
            level: this.level,
            useJson: this.useJson
        };
    }

    /**
     * Converts a value to a JSON-safe shape. Int payloads are bigints,
     * which JSON.stringify refuses, and Object payloads are Maps.
     */
    public static toViewable(obj: unknown): unknown {
        if (obj === null || obj === undefined) return obj;
        if (typeof obj === 'bigint') return obj.toString() + 'n';
        if (Array.isArray(obj)) return obj.map(item => Logger.toViewable(item));
        if (obj instanceof Map) {
            const result: Record<string, unknown> = {};
            for (const [key, value] of obj) {
                result[String(key)] = Logger.toViewable(value);
            }
            return result;
        }
        if (obj instanceof Error) {
            return { name: obj.name, message: obj.message };
        }
        if (typeof obj === 'object') {
            const result: Record<string, unknown> = {};
            for (const [key, value] of Object.entries(obj)) {
                result[key] = Logger.toViewable(value);
            }
            return result;
        }
        return obj;
    }
}

// Global default logger
export const logger = new Logger('patchbus');
