export enum LogLevel {
  Debug = 0,
  Information = 1,
  Warning = 2,
  Error = 3,
  None = 4,
}

export const DEBUG_LOGGING_ENV = "SPOTIFY_TAGGER_DEBUG";

export class Logger {
  constructor(private source: string, private minLogLevel: LogLevel) { }

  log(logLevel: LogLevel, message: string, ...args: unknown[]): void {
    if (logLevel < this.minLogLevel) return;

    const timestamp = `[${new Date().toJSON()}]`;
    const source = `[SPOTIFY-TAGGER:${this.source}]`;

    switch (logLevel) {
      case LogLevel.Error:
        console.error(timestamp, source, message, ...args);
        break;
      case LogLevel.Warning:
        console.warn(timestamp, source, message, ...args);
        break;
      case LogLevel.Information:
        console.info(timestamp, source, message, ...args);
        break;
      case LogLevel.Debug:
        console.debug(timestamp, source, message, ...args);
        break;
    }
  }

  logDebug(message: string, ...args: unknown[]) {
    // Debug output stays off unless the environment explicitly asks for it
    if (process.env[DEBUG_LOGGING_ENV] !== "true") return;

    this.log(LogLevel.Debug, message, ...args);
  }

  logInfo(message: string, ...args: unknown[]) {
    this.log(LogLevel.Information, message, ...args);
  }

  logWarn(message: string, ...args: unknown[]) {
    this.log(LogLevel.Warning, message, ...args);
  }

  logError(message: string, ...args: unknown[]) {
    this.log(LogLevel.Error, message, ...args);
  }

  static create(name: string, minLogLevel: LogLevel = LogLevel.Information) {
    return new Logger(name, minLogLevel);
  }
}
