/**
 * Output Formatter - Pretty CLI output with colors using chalk
 */

import chalk from "chalk";

export type MessageLevel = "info" | "success" | "warning" | "error";

export interface TableColumn {
  key: string;
  header: string;
  width?: number;
  align?: "left" | "right";
}

export type LineWriter = (line: string) => void;

export interface OutputFormatterOptions {
  quiet?: boolean;
  noColor?: boolean;
  stdout?: LineWriter;
  stderr?: LineWriter;
}

export class OutputFormatter {
  private readonly quiet: boolean;
  private readonly noColor: boolean;
  private readonly stdout: LineWriter;
  private readonly stderr: LineWriter;

  constructor(options: OutputFormatterOptions = {}) {
    this.quiet = options.quiet ?? false;
    this.noColor = options.noColor ?? !process.stdout.isTTY;
    this.stdout = options.stdout ?? ((line) => process.stdout.write(line + "\n"));
    this.stderr = options.stderr ?? ((line) => process.stderr.write(line + "\n"));
  }

  print(message: string, level: MessageLevel = "info"): void {
    if (this.quiet && level !== "error") return;

    const styled = this.noColor ? message : this.styleMessage(message, level);
    (level === "error" ? this.stderr : this.stdout)(styled);
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

  header(title: string): void {
    if (this.quiet) return;
    const styled = this.noColor
      ? `\n${title}\n${"=".repeat(title.length)}`
      : `\n${chalk.bold.cyan(title)}\n${chalk.dim("=".repeat(title.length))}`;
    this.stdout(styled);
  }

  keyValue(key: string, value: string | number | boolean): void {
    if (this.quiet) return;
    const formattedKey = this.noColor ? `  ${key}:` : chalk.dim(`  ${key}:`);
    const formattedValue = this.noColor ? ` ${value}` : ` ${chalk.white(String(value))}`;
    this.stdout(formattedKey + formattedValue);
  }

  table<T extends Record<string, unknown>>(data: T[], columns: TableColumn[]): void {
    if (this.quiet || data.length === 0) return;

    const widths = columns.map((col) => {
      const maxDataWidth = Math.max(...data.map((row) => String(row[col.key] ?? "").length));
      return col.width ?? Math.max(col.header.length, maxDataWidth);
    });

    const headerRow = columns.map((col, i) => padCell(col.header, widths[i], col.align ?? "left")).join("  ");
    const separator = widths.map((w) => "-".repeat(w)).join("  ");
    this.stdout(this.noColor ? headerRow : chalk.bold(headerRow));
    this.stdout(this.noColor ? separator : chalk.dim(separator));

    for (const row of data) {
      this.stdout(columns.map((col, i) => padCell(String(row[col.key] ?? ""), widths[i], col.align ?? "left")).join("  "));
    }
  }

  /**
   * Printed even in quiet mode
   */
  json(data: unknown): void {
    this.stdout(JSON.stringify(data, null, 2));
  }

  private styleMessage(message: string, level: MessageLevel): string {
    switch (level) {
      case "success":
        return chalk.green("✓ ") + message;
      case "warning":
        return chalk.yellow("⚠ ") + message;
      case "error":
        return chalk.red("✗ ") + message;
      default:
        return chalk.blue("ℹ ") + message;
    }
  }
}

function padCell(value: string, width: number, align: "left" | "right"): string {
  if (value.length >= width) return value.slice(0, width);
  return align === "right" ? value.padStart(width) : value.padEnd(width);
}
