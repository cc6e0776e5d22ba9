import type { ProgressReporter } from "@sampler/types";
import pc from "picocolors";

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

export function formatProgress(
  label: string,
  count: number,
  total: number | undefined,
  elapsedMs: number,
): string {
  const counter = total === undefined ? `${count}` : `${count}/${total}`;
  return `${label} ${pc.bold(counter)} ${pc.dim(formatDuration(elapsedMs))}`;
}

/** One self-overwriting status line on a TTY; silent when output is redirected. */
export class ProgressLine implements ProgressReporter {
  private label = "";
  private total: number | undefined;
  private count = 0;
  private startedAt = 0;

  constructor(private readonly stream: NodeJS.WriteStream = process.stderr) {}

  start(label: string, total?: number): void {
    this.label = label;
    this.total = total;
    this.count = 0;
    this.startedAt = Date.now();
    this.render();
  }

  tick(): void {
    this.count += 1;
    this.render();
  }

  finish(): void {
    this.render();
    if (this.stream.isTTY) {
      this.stream.write("\n");
    }
  }

  private render(): void {
    if (!this.stream.isTTY) {
      return;
    }
    const line = formatProgress(
      pc.cyan(this.label),
      this.count,
      this.total,
      Date.now() - this.startedAt,
    );
    this.stream.write(`\r\x1b[2K${line}`);
  }
}
