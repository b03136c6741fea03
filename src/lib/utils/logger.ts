/**
 * Logging utilities with structured output and log levels.
 *
 * Every level is written to stderr: stdout carries the MCP stdio transport.
 */

import { getConfig } from "../../config.js";

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogContext {
  [key: string]: unknown;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

class Logger {
  private level: LogLevel | null = null;

  /**
   * Get the current log level, reading from config if not yet set
   */
  private getLevel(): LogLevel {
    if (this.level === null) {
      try {
        this.level = getConfig().logLevel;
      } catch {
        // Config not loaded yet
        return "info";
      }
    }
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.getLevel());
  }

  /**
   * Format log message with context
   */
  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : "";
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (this.shouldLog(level)) {
      console.error(this.formatMessage(level, message, context));
    }
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  /**
   * Log tool invocation
   */
  logToolInvocation(toolName: string, args: unknown, context?: LogContext): void {
    this.debug(`Tool invoked: ${toolName}`, {
      tool: toolName,
      args,
      ...context,
    });
  }

  /**
   * Log parsing operation
   */
  logParsing(operation: string, context?: LogContext): void {
    this.debug(`Parsing: ${operation}`, {
      operation,
      ...context,
    });
  }

  /**
   * Log the outcome of chunking one document
   */
  logChunking(docId: string, context?: LogContext): void {
    this.debug(`Chunked document: ${docId}`, {
      doc_id: docId,
      ...context,
    });
  }

  /**
   * Log a batch handed to a passage sink
   */
  logSinkWrite(sink: string, count: number, context?: LogContext): void {
    this.debug(`Sink ${sink} accepted ${count} passages`, {
      sink,
      count,
      ...context,
    });
  }

  /**
   * Override the config-based level until resetLevel() is called
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Reset log level to read from config again
   */
  resetLevel(): void {
    this.level = null;
  }

  getCurrentLevel(): LogLevel {
    return this.getLevel();
  }
}

/**
 * Singleton logger instance
 */
export const logger = new Logger();
