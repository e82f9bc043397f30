/**
 * Centralized logging with debug mode support
 */

import { config } from "../config.js";
import type { CanFrame } from "../../../../packages/protocol/src/types.js";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

class Logger {
  private debugEnabled: boolean;

  constructor() {
    this.debugEnabled = config.debug;
  }

  /**
   * Format timestamp
   */
  private timestamp(): string {
    return new Date().toISOString();
  }

  /**
   * Format log message
   */
  private format(level: LogLevel, message: string, meta?: unknown): string {
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    return `[${this.timestamp()}] [${level}] ${message}${metaStr}`;
  }

  /**
   * Debug logs (only when GATEWAY_DEBUG=1)
   */
  debug(message: string, meta?: unknown): void {
    if (this.debugEnabled) {
      console.log(this.format(LogLevel.DEBUG, message, meta));
    }
  }

  /**
   * Info logs
   */
  info(message: string, meta?: unknown): void {
    console.log(this.format(LogLevel.INFO, message, meta));
  }

  /**
   * Warning logs
   */
  warn(message: string, meta?: unknown): void {
    console.warn(this.format(LogLevel.WARN, message, meta));
  }

  /**
   * Error logs
   */
  error(message: string, meta?: unknown): void {
    console.error(this.format(LogLevel.ERROR, message, meta));
  }

  /**
   * Log connection event
   */
  connection(connectionId: string, event: string, meta?: unknown): void {
    const message = `[${connectionId}] ${event}`;
    if (this.debugEnabled) {
      this.debug(message, meta);
    } else {
      this.info(message);
    }
  }

  /**
   * Log frame details (debug only)
   *
   * "←" is client to bus, "→" is bus to client.
   */
  frame(source: string, direction: "→" | "←", frame: CanFrame): void {
    if (!this.debugEnabled) return;

    this.debug(`[${source}] ${direction} Frame 0x${frame.id.toString(16)}`, {
      dlc: frame.dlc,
      flags: `0x${frame.flags.toString(16)}`,
      data: frame.payload.toString("hex"),
    });
  }

  /**
   * Log state transition (debug only)
   */
  stateTransition(connectionId: string, to: string, reason?: string): void {
    if (!this.debugEnabled) return;

    this.debug(
      `[${connectionId}] State → ${to}`,
      reason ? { reason } : undefined
    );
  }

  /**
   * Log backpressure event (debug only)
   */
  backpressure(connectionId: string, event: "detected" | "relieved"): void {
    if (!this.debugEnabled) return;

    this.debug(`[${connectionId}] Backpressure ${event}`);
  }
}

export const logger = new Logger();
