import { Injectable } from "@nestjs/common";
import fs from "fs";
import path from "path";
import pino, { type Logger, type LoggerOptions } from "pino";
import { DEFAULT_LOGGING } from "../config/defaults";
import type { LoggingConfig, LoggingDestination } from "../config/types";

/**
 * Owns the pino root logger. Logs go to stderr unless configured otherwise,
 * because stdout carries the inventory document.
 */
@Injectable()
export class LoggerService {
  private rootLogger: Logger | null = null;
  private cachedSignature = "";

  configure(config: LoggingConfig = DEFAULT_LOGGING): Logger {
    const signature = this.computeSignature(config);
    if (this.rootLogger && signature === this.cachedSignature) {
      return this.rootLogger;
    }
    this.rootLogger = this.buildLogger(config);
    this.cachedSignature = signature;
    return this.rootLogger;
  }

  getLogger(scope?: string): Logger {
    if (!this.rootLogger) {
      this.rootLogger = this.buildLogger(DEFAULT_LOGGING);
      this.cachedSignature = this.computeSignature(DEFAULT_LOGGING);
    }
    if (!scope) {
      return this.rootLogger;
    }
    return this.rootLogger.child({ scope });
  }

  reset(): void {
    this.rootLogger = null;
    this.cachedSignature = "";
  }

  private computeSignature(config: LoggingConfig): string {
    return JSON.stringify(config);
  }

  private resolvePrettyTransport(
    destination?: LoggingDestination
  ): LoggerOptions["transport"] {
    if (!destination?.pretty) return undefined;

    try {
      require.resolve("pino-pretty");
      return {
        target: "pino-pretty",
        options: {
          colorize: destination.colorize ?? true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
          destination: destination.type === "stdout" ? 1 : 2,
        },
      };
    } catch {
      return undefined;
    }
  }

  private prepareDestination(destination?: LoggingDestination) {
    switch (destination?.type) {
      case "stdout":
        return pino.destination({ fd: 1, sync: true });
      case "file": {
        const filePath = path.resolve(
          destination.path ?? "inventory.log"
        );
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        return pino.destination({ dest: filePath, sync: true });
      }
      default:
        return pino.destination({ fd: 2, sync: true });
    }
  }

  private buildLogger(config: LoggingConfig): Logger {
    const options: LoggerOptions = {
      level: config.level,
      base: undefined,
      timestamp:
        config.enableTimestamps === false
          ? false
          : pino.stdTimeFunctions.isoTime,
    };

    const transport = this.resolvePrettyTransport(config.destination);
    if (transport) {
      options.transport = transport;
      return pino(options);
    }

    return pino(options, this.prepareDestination(config.destination));
  }
}
