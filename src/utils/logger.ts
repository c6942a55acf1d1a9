import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import path from "path";
import fs from "fs";

export interface LoggerConfig {
  logFile?: string;
  logLevel?: string;
  enableConsole?: boolean;
}

function fileFormat(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  );
}

function lineFormat(prefix: string): winston.Logform.Format {
  return winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let log = `${timestamp} ${prefix}[${level}] ${message}`;
    if (Object.keys(meta).length > 0) {
      log += ` ${JSON.stringify(meta)}`;
    }
    return log;
  });
}

class Logger {
  private static instance: winston.Logger | null = null;
  private static config: LoggerConfig = {};

  static initialize(config: LoggerConfig = {}): void {
    Logger.config = config;
    Logger.instance = Logger.createLogger();
  }

  private static createLogger(): winston.Logger {
    const {
      logFile,
      logLevel = process.env.LOG_LEVEL || "info",
      enableConsole = false,
    } = Logger.config;

    const transports: winston.transport[] = [];

    if (logFile) {
      const logDir = path.dirname(logFile);

      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }

      const baseFileName = path.basename(logFile, path.extname(logFile));

      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${baseFileName}-%DATE%.log`),
          datePattern: "YYYY-MM-DD",
          maxSize: "20m",
          maxFiles: "14d",
          level: logLevel,
          format: fileFormat(),
        })
      );

      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${baseFileName}-error-%DATE%.log`),
          datePattern: "YYYY-MM-DD",
          maxSize: "20m",
          maxFiles: "30d",
          level: "error",
          format: fileFormat(),
        })
      );
    } else {
      // stdout carries the MCP protocol, so everything goes to stderr
      transports.push(
        new winston.transports.Console({
          stderrLevels: ["error", "warn", "info", "debug", "verbose"],
          level: logLevel,
          format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.errors({ stack: true }),
            lineFormat("[course-rag] ")
          ),
        })
      );
    }

    if (enableConsole) {
      transports.push(
        new winston.transports.Console({
          stderrLevels: ["error", "warn", "info", "debug", "verbose"],
          level: logLevel,
          format: winston.format.combine(
            winston.format.colorize(),
            winston.format.timestamp({ format: "HH:mm:ss" }),
            lineFormat("")
          ),
        })
      );
    }

    return winston.createLogger({
      level: logLevel,
      transports,
      exitOnError: false,
      silent: false,
    });
  }

  static getLogger(): winston.Logger {
    if (!Logger.instance) {
      Logger.instance = Logger.createLogger();
    }
    return Logger.instance;
  }

  static error(message: string, meta?: unknown): void {
    Logger.getLogger().error(message, meta);
  }

  static warn(message: string, meta?: unknown): void {
    Logger.getLogger().warn(message, meta);
  }

  static info(message: string, meta?: unknown): void {
    Logger.getLogger().info(message, meta);
  }

  static debug(message: string, meta?: unknown): void {
    Logger.getLogger().debug(message, meta);
  }
}

export default Logger;
