export const enum LogLevel {
    error = 0,
    warning = 1,
    info = 2,
    debug = 3,
}

export class System {
    constructor(private printCb: (message: string) => void, private logLevel = LogLevel.info) {}

    log(message: string, level = LogLevel.info): void {
        if (level > this.logLevel) return;

        this.printCb(message);
    }

    error(message: string): void {
        this.log(message, LogLevel.error);
    }

    warning(message: string): void {
        this.log(message, LogLevel.warning);
    }

    info(message: string): void {
        this.log(message, LogLevel.info);
    }

    debug(message: string): void {
        this.log(message, LogLevel.debug);
    }

    setLogLevel(logLevel: LogLevel): void {
        this.logLevel = logLevel;
    }

    getLogLevel(): LogLevel {
        return this.logLevel;
    }
}

export function silentSystem(): System {
    return new System(() => undefined);
}
