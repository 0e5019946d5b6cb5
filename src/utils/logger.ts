import * as fs from "fs";
import * as path from "path";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

function resolveLevel(raw: string | undefined): LogLevel {
  const normalized = (raw || "").trim().toUpperCase();
  if (
    normalized === "DEBUG" ||
    normalized === "INFO" ||
    normalized === "WARN" ||
    normalized === "ERROR"
  ) {
    return normalized;
  }
  return "INFO";
}

class Logger {
  private logFilePath: string | null = null;
  private threshold: LogLevel;

  constructor() {
    this.threshold = resolveLevel(process.env.LOG_LEVEL);

    if (process.env.LOG_TO_FILE !== "false") {
      // 确保日志目录存在
      const logsDir = path.resolve(process.env.LOG_DIR || path.join(process.cwd(), "logs"));
      if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
      }

      // log_YYYY-MM-DD_HH-mm-ss.log
      const timestamp = this.formatDateForFilename(new Date());
      this.logFilePath = path.join(logsDir, `log_${timestamp}.log`);
      this.write("SYSTEM", `Logger initialized. Log file: ${this.logFilePath}`);
    }
  }

  private formatDateForFilename(date: Date): string {
    const pad = (n: number) => n.toString().padStart(2, "0");
    const yyyy = date.getFullYear();
    const MM = pad(date.getMonth() + 1);
    const dd = pad(date.getDate());
    const HH = pad(date.getHours());
    const mm = pad(date.getMinutes());
    const ss = pad(date.getSeconds());
    return `${yyyy}-${MM}-${dd}_${HH}-${mm}-${ss}`;
  }

  private formatMessage(level: string, message: string): string {
    const now = new Date().toISOString();
    return `[${now}] [${level}] ${message}`;
  }

  /**
   * 写入日志到控制台和文件
   */
  private write(level: string, message: string) {
    const formatted = this.formatMessage(level, message);

    if (level === "ERROR") {
      console.error(formatted);
    } else {
      console.log(formatted);
    }

    if (!this.logFilePath) return;

    // 同步写入以确保不丢失
    try {
      fs.appendFileSync(this.logFilePath, formatted + "\n");
    } catch (err) {
      console.error("Failed to write to log file:", err);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.threshold];
  }

  public setLevel(level: LogLevel) {
    this.threshold = level;
  }

  public info(message: string) {
    if (this.enabled("INFO")) this.write("INFO", message);
  }

  public warn(message: string) {
    if (this.enabled("WARN")) this.write("WARN", message);
  }

  public error(message: string, error?: unknown) {
    if (!this.enabled("ERROR")) return;
    let msg = message;
    if (error) {
      msg += ` | Error: ${error instanceof Error ? error.message : String(error)}`;
      if (error instanceof Error && error.stack) {
        msg += `\nStack: ${error.stack}`;
      }
    }
    this.write("ERROR", msg);
  }

  public debug(message: string) {
    if (this.enabled("DEBUG")) this.write("DEBUG", message);
  }
}

// 导出单例
export const logger = new Logger();
