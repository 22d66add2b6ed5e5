import chalk from "chalk";

export type LoggerFunc = (moduleName: string) => ILogger;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ILogger {
    debug: (...parts: unknown[]) => void,
    info: (...parts: unknown[]) => void,
    warn: (...parts: unknown[]) => void,
    error: (...parts: unknown[]) => void,
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

export class DummyLogger implements ILogger {
    debug() { };
    info() { };
    warn() { };
    error() { };
}

export class FancyLogger implements ILogger {
    constructor(private moduleName: string, private minLevel: LogLevel = "debug") { }

    debug(...parts: unknown[]) {
        if (this.enabled("debug")) {
            console.log(`${chalk.blue('DEBG')} [${this.moduleName}]`, ...parts);
        }
    }
    info(...parts: unknown[]) {
        if (this.enabled("info")) {
            console.info(`${chalk.green('INFO')} [${this.moduleName}]`, ...parts);
        }
    }
    warn(...parts: unknown[]) {
        if (this.enabled("warn")) {
            console.warn(`${chalk.yellow('WARN')} [${this.moduleName}]`, ...parts);
        }
    }
    error(...parts: unknown[]) {
        if (this.enabled("error")) {
            console.error(`${chalk.red('ERRO')} [${this.moduleName}]`, ...parts);
        }
    }

    private enabled(level: LogLevel) {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
    }
}

/**
 * Resolve a logger for a module, falling back to a silent one when the
 * caller did not supply a factory.
 */
export function loggerFor(moduleName: string, factory?: LoggerFunc): ILogger {
    return factory ? factory(moduleName) : new DummyLogger();
}
