/**
 * 统一日志实现（stderr + 可选 JSONL 落盘）。
 *
 * 关键点（中文）
 * - 控制台输出全部走 stderr：stdout 只留给报告本身（`--json` 可直接管道消费）。
 * - 绑定仓库根目录且开启 `logging.persist` 后，才写 `.skillbase/logs/*.jsonl`。
 */

import fs from "fs-extra";
import path from "path";
import { getLogsDirPath } from "../../project/paths.js";
import type { LogLevel } from "../../types/config.js";
import type { JsonObject, JsonValue } from "../../types/json.js";
import { getTimestamp } from "../time.js";

type LogDetails = {
  [key: string]: JsonValue | undefined;
};

function normalizeLogDetails(details?: LogDetails): JsonObject | undefined {
  if (!details) return undefined;
  const normalized: JsonObject = {};
  for (const [key, value] of Object.entries(details)) {
    if (value !== undefined) {
      normalized[key] = value;
    }
  }
  return Object.keys(normalized).length > 0 ? normalized : undefined;
}

export type LogEntryType = "info" | "warn" | "error" | "debug" | "action";

export interface LogEntry {
  id: string;
  timestamp: string;
  type: LogEntryType;
  message: string;
  details?: JsonObject;
}

const LEVEL_RANK: Record<LogEntryType, number> = {
  debug: 10,
  info: 20,
  action: 20,
  warn: 30,
  error: 40,
};

export type LogSink = (line: string) => void;

/**
 * Logger：进程级日志器。
 *
 * 关键职责（中文）
 * - 控制台可读输出（按 level 过滤）
 * - JSONL 持久化输出（排障/审计），写入串行化，避免并发写乱序
 */
export class Logger {
  private logs: LogEntry[] = [];
  private logLevel: LogLevel;
  private writeChain: Promise<void> = Promise.resolve();
  private readonly maxInMemoryEntries = 2000;
  private logsDir: string | null = null;
  private writeFailureReported = false;
  private readonly sink: LogSink;

  constructor(logLevel: LogLevel = "info", sink: LogSink = (line) => console.error(line)) {
    this.logLevel = logLevel;
    this.sink = sink;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /**
   * 绑定仓库根目录。
   *
   * 关键点（中文）
   * - 未绑定时只打印，不写入 `.skillbase/logs/*`。
   * - persist=false 时等同于解绑。
   */
  bindProjectRoot(projectRoot: string, persist: boolean): void {
    const root = String(projectRoot || "").trim();
    this.logsDir = root && persist ? getLogsDirPath(root) : null;
  }

  info(message: string, details?: LogDetails): void {
    void this.emit("info", message, details);
  }

  warn(message: string, details?: LogDetails): void {
    void this.emit("warn", message, details);
  }

  error(message: string, details?: LogDetails): void {
    void this.emit("error", message, details);
  }

  debug(message: string, details?: LogDetails): void {
    void this.emit("debug", message, details);
  }

  action(message: string, details?: LogDetails): void {
    void this.emit("action", message, details);
  }

  private isEnabled(type: LogEntryType): boolean {
    return LEVEL_RANK[type] >= LEVEL_RANK[this.logLevel];
  }

  private async emit(
    type: LogEntryType,
    message: string,
    details?: LogDetails,
  ): Promise<void> {
    const entry: LogEntry = {
      id: this.generateId(),
      timestamp: getTimestamp(),
      type,
      message,
      details: normalizeLogDetails(details),
    };

    this.logs.push(entry);
    if (this.logs.length > this.maxInMemoryEntries) {
      this.logs.splice(0, this.logs.length - this.maxInMemoryEntries);
    }
    if (this.isEnabled(type)) this.printLog(entry);

    const logsDir = this.logsDir;
    if (!logsDir) return;
    this.writeChain = this.writeChain.then(() =>
      this.saveToFile(logsDir, entry).catch((error: unknown) =>
        this.reportWriteFailure(error),
      ),
    );
    await this.writeChain;
  }

  private reportWriteFailure(error: unknown): void {
    // 只提示一次：落盘失败不影响命令本身
    if (this.writeFailureReported) return;
    this.writeFailureReported = true;
    const reason = error instanceof Error ? error.message : String(error);
    this.sink(`[skillbase] log persistence disabled: ${reason}`);
  }

  private printLog(entry: LogEntry): void {
    const level = entry.type.toUpperCase().padEnd(6);
    const message = `[${level}] ${entry.message}`;

    switch (entry.type) {
      case "error":
        this.sink(`\x1b[31m${message}\x1b[0m`);
        break;
      case "warn":
        this.sink(`\x1b[33m${message}\x1b[0m`);
        break;
      case "debug":
        this.sink(`\x1b[90m${message}\x1b[0m`);
        break;
      case "action":
        this.sink(`\x1b[36m${message}\x1b[0m`);
        break;
      default:
        this.sink(message);
    }
  }

  /**
   * 落盘（中文）
   * - 按自然日分片：`.skillbase/logs/YYYY-MM-DD.jsonl`，每条一行。
   */
  private async saveToFile(logsDir: string, entry: LogEntry): Promise<void> {
    const date = entry.timestamp.split("T")[0];
    const logFile = path.join(logsDir, `${date}.jsonl`);
    await fs.ensureDir(logsDir);
    await fs.appendFile(logFile, JSON.stringify(entry) + "\n");
  }

  private generateId(): string {
    return Date.now().toString(36) + Math.random().toString(36).slice(2, 8);
  }

  async flush(): Promise<void> {
    await this.writeChain;
  }

  getLogs(): LogEntry[] {
    return this.logs;
  }
}

export const logger = new Logger();

export function getLogger(): Logger {
  return logger;
}
