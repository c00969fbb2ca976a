import env from "@/env";
import { createLogger, format, transports } from "winston";

const logger = createLogger({
  level: env.LOG_LEVEL,
  format: format.combine(
    format.errors({ stack: true }),
    format.colorize(),
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    format.printf(({ timestamp, level, message, label, stack }) => {
      const prefix = typeof label === "string" ? `[${label}] ` : "";
      let log = `[${timestamp as string}] [${level}]: ${prefix}${message as string}`;
      if (typeof stack === "string") {
        log = `${log}\n${stack}`;
      }
      return log;
    }),
  ),
  transports: [
    new transports.Console({
      stderrLevels: ["warn", "error"],
    }),
  ],
});

export default logger;
