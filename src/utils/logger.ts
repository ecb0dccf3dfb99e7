import winston, { Logger, format } from "winston";
import path from "path";
import fs from "fs";
import DailyRotateFile from "winston-daily-rotate-file";

interface LoggerConfig {
  logDir: string;
  logLevel: string;
  appName: string;
  environment: string;
  maxSize: number;
  maxFiles: number;
  enableConsole: boolean;
  enableFile: boolean;
}

const ensureLogDir = (logDir: string): void => {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
};

/**
 * Environment-driven settings
 */
const getConfig = (): LoggerConfig => {
  const environment = process.env.NODE_ENV || "development";

  return {
    logDir: process.env.LOG_FILE_PATH || "./logs",
    logLevel: process.env.LOG_LEVEL || "info",
    appName: process.env.APP_NAME || "directory-sync",
    environment,
    maxSize: parseInt(process.env.LOG_MAX_SIZE || "5242880", 10), // 5MB
    maxFiles: parseInt(process.env.LOG_MAX_FILES || "5", 10),
    enableConsole: environment !== "test",
    enableFile: process.env.LOG_FILE
      ? process.env.LOG_FILE !== "false"
      : environment !== "test",
  };
};

const getConsoleFormat = () =>
  format.combine(
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.colorize({ all: true }),
    format.printf(({ timestamp, level, message, service, environment: _env, ...meta }) => {
      const metaStr = Object.keys(meta).length
        ? `\n${JSON.stringify(meta, null, 2)}`
        : "";
      return `${timestamp} [${service}] ${level}: ${message}${metaStr}`;
    }),
  );

const getFileFormat = () =>
  format.combine(
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.errors({ stack: true }),
    format.splat(),
    format.metadata({
      fillExcept: ["message", "level", "timestamp", "service"],
    }),
    format.json(),
  );

/**
 * Create Winston Logger instance
 */
const createLogger = (): Logger => {
  const config = getConfig();
  const isProduction = config.environment === "production";

  const transports: winston.transport[] = [
    new winston.transports.Console({
      level: isProduction ? "info" : config.logLevel,
      silent: !config.enableConsole,
      format: isProduction
        ? format.combine(format.timestamp(), format.json())
        : getConsoleFormat(),
    }),
  ];

  if (config.enableFile) {
    ensureLogDir(config.logDir);

    transports.push(
      new DailyRotateFile({
        filename: path.join(config.logDir, "combined-%DATE%.log"),
        datePattern: "YYYY-MM-DD",
        level: "info",
        format: getFileFormat(),
        maxSize: config.maxSize,
        maxFiles: `${config.maxFiles}d`,
        auditFile: path.join(config.logDir, ".combined-audit.json"),
      }),
      new DailyRotateFile({
        filename: path.join(config.logDir, "error-%DATE%.log"),
        datePattern: "YYYY-MM-DD",
        level: "error",
        format: getFileFormat(),
        maxSize: config.maxSize,
        maxFiles: `${config.maxFiles}d`,
        auditFile: path.join(config.logDir, ".error-audit.json"),
      }),
    );
  }

  return winston.createLogger({
    level: config.logLevel,
    format: getFileFormat(),
    defaultMeta: {
      service: config.appName,
      environment: config.environment,
    },
    transports,
  });
};

const logger = createLogger();

export default logger;
export type { Logger };
