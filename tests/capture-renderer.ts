import type { Renderer } from '../src/cli/ui/renderer.js';
import type { SpinnerHandle } from '../src/cli/ui/spinner.js';

/** Records what commands report instead of printing it. */
export class CaptureRenderer implements Renderer {
  readonly lines: string[] = [];
  readonly values: unknown[] = [];

  taskList(title: string): void {
    this.lines.push(`list: ${title}`);
  }
  taskDetail(): void {}
  taskTree(): void {}
  findings(): void {}
  ledger(): void {}
  mergeReport(): void {}

  error(title: string, details: string): void {
    this.lines.push(`error: ${title}: ${details}`);
  }
  warn(message: string): void {
    this.lines.push(`warn: ${message}`);
  }

  spinner(message: string): SpinnerHandle {
    this.lines.push(`spinner: ${message}`);
    return {
      update: (text) => this.lines.push(`spinner: ${text}`),
      stop: () => {}
    };
  }

  data(value: unknown): void {
    this.values.push(value);
  }
  text(message: string): void {
    this.lines.push(message);
  }
  blank(): void {}
  info(message: string): void {
    this.lines.push(`info: ${message}`);
  }
  success(message: string): void {
    this.lines.push(`success: ${message}`);
  }
  dim(message: string): void {
    this.lines.push(`dim: ${message}`);
  }
}
