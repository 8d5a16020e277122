import path from "node:path";
import { createLogger, format, transports, type Logger } from "winston";

const isProd = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";
const level = process.env.LOG_LEVEL ?? (isProd ? "info" : "debug");
const logDir = process.env.LOG_DIR ?? "./logs";

// Common pre-formatting
const base = format.combine(
  format.timestamp(),
  format.errors({ stack: true }), // ensure Error.stack is serialized
  format.splat() // supports printf-style %s, %j etc.
);

// Pretty for dev, JSON for prod
const devFmt = format.combine(
  format.colorize({ all: true }),
  format.printf((info) => {
    const { timestamp, level, message, stack, ...meta } = info;
    const metaStr = Object.keys(meta).length
      ? `\n${JSON.stringify(meta, null, 2)}`
      : "";
    return `${String(timestamp)} ${level} ${String(message)}${
      stack ? `\n${String(stack)}` : ""
    }${metaStr}`;
  })
);

const prodFmt = format.json();

function fileTransports(): transports.FileTransportInstance[] {
  return [
    new transports.File({ filename: path.join(logDir, "app.log"), level: "info" }),
    new transports.File({ filename: path.join(logDir, "error.log"), level: "error" }),
  ];
}

export const logger: Logger = isTest
  ? createLogger({ level, silent: true, transports: [new transports.Console()] })
  : createLogger({
      level,
      format: isProd ? format.combine(base, prodFmt) : format.combine(base, devFmt),
      transports: [new transports.Console(), ...fileTransports()],
      exceptionHandlers: [
        new transports.File({ filename: path.join(logDir, "exceptions.log") }),
      ],
      rejectionHandlers: [
        new transports.File({ filename: path.join(logDir, "rejections.log") }),
      ],
    });
