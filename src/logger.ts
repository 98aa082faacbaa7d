import winston from "winston";
import { loadConfig, type LogLevel } from "./config.js";

export type LoggerOptions = {
  level?: LogLevel;
  /** Write JSON lines to this file. */
  logFile?: string;
  /** Write to stderr. The terminal UI owns stdout, so this is off unless asked for. */
  logToConsole?: boolean;
  silent?: boolean;
};

let instance: winston.Logger | null = null;

export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const transports: winston.transport[] = [];
  if (options.logFile) {
    transports.push(new winston.transports.File({ filename: options.logFile }));
  }
  if (options.logToConsole) {
    transports.push(
      new winston.transports.Console({
        stderrLevels: ["error", "warn", "info", "debug"],
        format: winston.format.combine(
          winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
          winston.format.printf(({ level, message, timestamp }) => `${timestamp} ${level.toUpperCase()}: ${message}`),
        ),
      }),
    );
  }

  return winston.createLogger({
    level: options.level ?? "info",
    // winston complains about writes with no transports, so an unconfigured logger stays silent
    silent: options.silent ?? transports.length === 0,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    defaultMeta: { service: "termform" },
    transports,
  });
}

export function getLogger(): winston.Logger {
  if (!instance) {
    const config = loadConfig();
    instance = createLogger({
      level: config.logLevel,
      logFile: config.logFile,
      logToConsole: config.logToConsole,
    });
  }
  return instance;
}

export function setLogger(logger: winston.Logger): void {
  instance = logger;
}
