import { type Logger, type LogLevel } from '@helix/core';
import pino, { type DestinationStream, type Logger as PinoInstance } from 'pino';

export interface PinoLoggerOptions {
    level?: LogLevel;
    prettyPrint?: boolean;
    name?: string;
    /** Fields bound to every line, e.g. `{ service: 'helix' }`. */
    base?: Record<string, unknown>;
    /** Writes JSON lines here instead of stdout; ignored with `prettyPrint`. */
    destination?: DestinationStream;
}

/** Credentials that may reach a log line through bound provider config. */
const REDACTED_PATHS = ['apiKey', '*.apiKey', 'authorization', '*.authorization'];

function createPino(options: PinoLoggerOptions): PinoInstance {
    const { level = 'info', prettyPrint = false, name, base, destination } = options;

    const pinoOptions: pino.LoggerOptions = {
        level,
        redact: { paths: REDACTED_PATHS, censor: '[redacted]' }
    };
    if (name) pinoOptions.name = name;
    if (base) pinoOptions.base = base;

    if (prettyPrint) {
        pinoOptions.transport = {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        };
        return pino(pinoOptions);
    }

    return destination ? pino(pinoOptions, destination) : pino(pinoOptions);
}

/** Logger port backed by pino. Children share the parent's destination. */
export class PinoLogger implements Logger {
    private readonly pino: PinoInstance;

    constructor(options: PinoLoggerOptions = {}, instance?: PinoInstance) {
        this.pino = instance ?? createPino(options);
    }

    public get level(): string {
        return this.pino.level;
    }

    private emit(level: LogLevel, arg: Record<string, unknown> | string, msg?: string): void {
        if (typeof arg === 'string') {
            this.pino[level](arg);
        } else {
            this.pino[level](arg, msg);
        }
    }

    public trace(obj: Record<string, unknown>, msg?: string): void;
    public trace(msg: string): void;
    public trace(arg: Record<string, unknown> | string, msg?: string): void {
        this.emit('trace', arg, msg);
    }

    public debug(obj: Record<string, unknown>, msg?: string): void;
    public debug(msg: string): void;
    public debug(arg: Record<string, unknown> | string, msg?: string): void {
        this.emit('debug', arg, msg);
    }

    public info(obj: Record<string, unknown>, msg?: string): void;
    public info(msg: string): void;
    public info(arg: Record<string, unknown> | string, msg?: string): void {
        this.emit('info', arg, msg);
    }

    public warn(obj: Record<string, unknown>, msg?: string): void;
    public warn(msg: string): void;
    public warn(arg: Record<string, unknown> | string, msg?: string): void {
        this.emit('warn', arg, msg);
    }

    public error(obj: Record<string, unknown>, msg?: string): void;
    public error(msg: string): void;
    public error(arg: Record<string, unknown> | string, msg?: string): void {
        this.emit('error', arg, msg);
    }

    public fatal(obj: Record<string, unknown>, msg?: string): void;
    public fatal(msg: string): void;
    public fatal(arg: Record<string, unknown> | string, msg?: string): void {
        this.emit('fatal', arg, msg);
    }

    public child(bindings: Record<string, unknown>): Logger {
        return new PinoLogger({}, this.pino.child(bindings));
    }
}
