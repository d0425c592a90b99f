/**
 * Output Formatter - Pretty CLI output with colors using chalk
 */

import chalk from "chalk";

export type PrintLevel = "info" | "success" | "warning" | "error" | "debug";

export interface TableColumn {
  key: string;
  header: string;
  width?: number;
  align?: "left" | "right";
}

export class OutputFormatter {
  private readonly quiet: boolean;
  private readonly noColor: boolean;

  constructor(options: { quiet?: boolean; noColor?: boolean } = {}) {
    this.quiet = options.quiet ?? false;
    this.noColor = options.noColor ?? !process.stdout.isTTY;
  }

  print(message: string, level: PrintLevel = "info"): void {
    if (this.quiet && level !== "error") return;

    const styled = this.noColor ? message : this.styleMessage(message, level);
    const stream = level === "error" || level === "warning" ? process.stderr : process.stdout;
    stream.write(styled + "\n");
  }

  success(message: string): void {
    this.print(message, "success");
  }

  info(message: string): void {
    this.print(message, "info");
  }

  warn(message: string): void {
    this.print(message, "warning");
  }

  error(message: string): void {
    this.print(message, "error");
  }

  debug(message: string): void {
    this.print(message, "debug");
  }

  /**
   * Conversation text goes out unstyled, even in quiet mode
   */
  reply(content: string): void {
    process.stdout.write(content.endsWith("\n") ? content : content + "\n");
  }

  header(title: string): void {
    if (this.quiet) return;
    const styled = this.noColor
      ? `\n${title}\n${"=".repeat(title.length)}`
      : `\n${chalk.bold.cyan(title)}\n${chalk.dim("=".repeat(title.length))}`;
    console.log(styled);
  }

  table<T extends Record<string, unknown>>(data: T[], columns: TableColumn[]): void {
    if (this.quiet || data.length === 0) return;

    const widths = columns.map((col) => {
      const maxDataWidth = Math.max(...data.map((row) => String(row[col.key] ?? "").length));
      return col.width ?? Math.max(col.header.length, maxDataWidth);
    });

    const headerRow = columns.map((col, i) => this.padCell(col.header, widths[i] ?? 0, col.align)).join("  ");
    const separator = widths.map((w) => "-".repeat(w)).join("  ");
    console.log(this.noColor ? headerRow : chalk.bold(headerRow));
    console.log(this.noColor ? separator : chalk.dim(separator));

    for (const row of data) {
      console.log(
        columns.map((col, i) => this.padCell(String(row[col.key] ?? ""), widths[i] ?? 0, col.align)).join("  ")
      );
    }
  }

  /**
   * Spinner on a TTY, a single line elsewhere; returns the stop function
   */
  progress(message: string): () => void {
    if (this.quiet) return () => {};
    if (!process.stderr.isTTY) {
      process.stderr.write(message + "\n");
      return () => {};
    }

    const frames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
    let i = 0;
    const interval = setInterval(() => {
      const frame = frames[i % frames.length] ?? "-";
      process.stderr.write(`\r${this.noColor ? frame : chalk.cyan(frame)} ${message}`);
      i++;
    }, 80);

    let stopped = false;
    return () => {
      if (stopped) return;
      stopped = true;
      clearInterval(interval);
      process.stderr.write("\r" + " ".repeat(message.length + 3) + "\r");
    };
  }

  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  newline(): void {
    if (!this.quiet) console.log();
  }

  formatDuration(ms: number): string {
    if (ms < 1000) return `${ms}ms`;
    if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
    const minutes = Math.floor(ms / 60_000);
    const seconds = Math.floor((ms % 60_000) / 1000);
    return `${minutes}m ${seconds}s`;
  }

  formatTime(timestamp: number): string {
    return new Date(timestamp).toISOString().replace("T", " ").slice(0, 19);
  }

  private styleMessage(message: string, level: PrintLevel): string {
    switch (level) {
      case "success":
        return chalk.green("✓ ") + message;
      case "warning":
        return chalk.yellow("⚠ ") + message;
      case "error":
        return chalk.red("✗ ") + message;
      case "debug":
        return chalk.dim(message);
      default:
        return message;
    }
  }

  private padCell(value: string, width: number, align: "left" | "right" = "left"): string {
    return align === "right" ? value.padStart(width) : value.padEnd(width);
  }
}
