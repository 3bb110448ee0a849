/**
 * Centralized logging with coloured level prefixes and a single-line
 * progress bar for crawls. The bar is only drawn on a TTY and only when
 * `showProgress` is enabled.
 */

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",

  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",

  clearLine: "\x1b[2K",
  cursorToStart: "\x1b[0G",
  hideCursor: "\x1b[?25l",
  showCursor: "\x1b[?25h",
} as const;

export type LogLevel = "debug" | "info" | "success" | "warn" | "error";

interface LoggerConfig {
  verbose: boolean;
  showProgress: boolean;
}

interface ProgressState {
  saved: number;
  total: number;
  currentUrl: string;
  failures: number;
  startTime: number;
}

const PROGRESS_BAR_WIDTH = 30;
const MIN_TERMINAL_WIDTH = 80;
const FIXED_PROGRESS_WIDTH = 60;

const levelStyles: Record<LogLevel, { color: string; prefix: string }> = {
  debug: { color: ANSI.gray, prefix: "DEBUG" },
  info: { color: ANSI.blue, prefix: "INFO" },
  success: { color: ANSI.green, prefix: "OK" },
  warn: { color: ANSI.yellow, prefix: "WARN" },
  error: { color: ANSI.red, prefix: "ERROR" },
};

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }

  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${seconds % 60}s`;
}

class Logger {
  private config: LoggerConfig = { verbose: false, showProgress: true };
  private progress: ProgressState | null = null;
  private lastProgressLine = "";
  private readonly isTerminal = process.stdout.isTTY ?? false;

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  private get drawsProgress(): boolean {
    return this.isTerminal && this.config.showProgress && this.progress !== null;
  }

  private formatMessage(level: LogLevel, message: string): string {
    const style = levelStyles[level];
    const timestamp = this.config.verbose
      ? `${ANSI.dim}[${new Date().toISOString().slice(11, 23)}]${ANSI.reset} `
      : "";
    return `${timestamp}${style.color}${ANSI.bold}[${style.prefix}]${ANSI.reset} ${message}`;
  }

  private clearProgressLine(): void {
    if (this.isTerminal && this.lastProgressLine) {
      process.stdout.write(`${ANSI.cursorToStart}${ANSI.clearLine}`);
      this.lastProgressLine = "";
    }
  }

  private writeLog(level: LogLevel, message: string): void {
    this.clearProgressLine();
    const formatted = this.formatMessage(level, message);

    if (level === "error") {
      console.error(formatted);
    } else if (level === "warn") {
      console.warn(formatted);
    } else {
      console.info(formatted);
    }

    this.renderProgress();
  }

  debug(message: string): void {
    if (this.config.verbose) {
      this.writeLog("debug", message);
    }
  }

  info(message: string): void {
    this.writeLog("info", message);
  }

  success(message: string): void {
    this.writeLog("success", message);
  }

  warn(message: string): void {
    this.writeLog("warn", message);
  }

  error(message: string): void {
    this.writeLog("error", message);
  }

  startProgress(total: number): void {
    this.progress = {
      saved: 0,
      total,
      currentUrl: "",
      failures: 0,
      startTime: Date.now(),
    };

    if (this.drawsProgress) {
      process.stdout.write(ANSI.hideCursor);
    }
    this.renderProgress();
  }

  /**
   * Crawls discover pages as they go, so the total grows with every claim.
   */
  updateProgress(update: {
    saved?: number;
    total?: number;
    url?: string;
  }): void {
    if (!this.progress) {
      return;
    }

    this.progress.saved = update.saved ?? this.progress.saved;
    this.progress.total = update.total ?? this.progress.total;
    this.progress.currentUrl = update.url ?? this.progress.currentUrl;
    this.renderProgress();
  }

  recordFailure(): void {
    if (!this.progress) {
      return;
    }

    this.progress.failures += 1;
    this.renderProgress();
  }

  endProgress(): void {
    this.clearProgressLine();
    if (this.drawsProgress) {
      process.stdout.write(ANSI.showCursor);
    }

    if (this.progress) {
      const elapsed = formatDuration(Date.now() - this.progress.startTime);
      const { saved, failures } = this.progress;
      const summary =
        failures > 0
          ? `${ANSI.green}${saved} saved${ANSI.reset}, ${ANSI.red}${failures} failed${ANSI.reset}`
          : `${ANSI.green}${saved} saved${ANSI.reset}`;
      console.info(
        `${ANSI.cyan}${ANSI.bold}[DONE]${ANSI.reset} Crawled in ${ANSI.bold}${elapsed}${ANSI.reset} (${summary})`
      );
    }

    this.progress = null;
  }

  private renderProgress(): void {
    if (!(this.drawsProgress && this.progress)) {
      return;
    }

    const { saved, total, currentUrl, failures } = this.progress;
    const ratio = total > 0 ? Math.min(1, saved / total) : 0;
    const filled = Math.round(ratio * PROGRESS_BAR_WIDTH);
    const bar = `${ANSI.green}${"█".repeat(filled)}${ANSI.gray}${"░".repeat(PROGRESS_BAR_WIDTH - filled)}${ANSI.reset}`;
    const failureText =
      failures > 0 ? ` ${ANSI.red}(${failures} failed)${ANSI.reset}` : "";
    const elapsed = formatDuration(Date.now() - this.progress.startTime);

    const termWidth = process.stdout.columns ?? MIN_TERMINAL_WIDTH;
    const maxUrlLength = Math.max(20, termWidth - FIXED_PROGRESS_WIDTH);
    const displayUrl =
      currentUrl.length > maxUrlLength
        ? `...${currentUrl.slice(-(maxUrlLength - 3))}`
        : currentUrl;

    const progressLine = `${ANSI.cursorToStart}${ANSI.clearLine}${bar} ${ANSI.bold}${Math.round(ratio * 100)}%${ANSI.reset} ${ANSI.dim}(${saved}/${total})${ANSI.reset}${failureText} ${ANSI.dim}${elapsed}${ANSI.reset} ${ANSI.cyan}${displayUrl}${ANSI.reset}`;

    this.lastProgressLine = progressLine;
    process.stdout.write(progressLine);
  }

  logFetch(url: string, attempt: number, maxAttempts: number): void {
    this.debug(`Fetching (${attempt}/${maxAttempts}): ${url}`);
  }

  logFetchError(url: string, attempt: number, error: unknown): void {
    this.debug(`Fetch attempt ${attempt} failed for ${url}: ${String(error)}`);
  }

  logPageSaved(url: string, contentFile: string, depth: number): void {
    this.success(
      `Saved ${ANSI.cyan}${url}${ANSI.reset} → ${contentFile} ${ANSI.dim}(depth ${depth})${ANSI.reset}`
    );
  }

  logSkipped(message: string): void {
    this.debug(`Skipped: ${message}`);
  }

  printFailureSummary(failures: string[]): void {
    if (failures.length === 0) {
      return;
    }

    console.warn(
      `\n${ANSI.yellow}${ANSI.bold}Failures (${failures.length}):${ANSI.reset}`
    );
    for (const failure of failures) {
      console.warn(`  ${ANSI.dim}•${ANSI.reset} ${failure}`);
    }
  }

  /**
   * Print crawl configuration (verbose only).
   */
  logCrawlStart(startUrl: string, config: Record<string, unknown>): void {
    if (!this.config.verbose) {
      return;
    }

    console.info(`\n${ANSI.cyan}${ANSI.bold}Crawl Configuration:${ANSI.reset}`);
    console.info(`  ${ANSI.dim}Start URL:${ANSI.reset} ${startUrl}`);
    for (const [key, value] of Object.entries(config)) {
      console.info(`  ${ANSI.dim}${key}:${ANSI.reset} ${String(value)}`);
    }
    console.info("");
  }
}

export const logger = new Logger();
