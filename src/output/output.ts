/**
 * Console output for workspace operations.
 *
 * Every operation receives an {@link Output} built from an explicit
 * {@link OutputConfig}; there is no process-wide color or verbosity state.
 */

import { Chalk, type ChalkInstance } from "chalk";
import { SingleBar, Presets } from "cli-progress";

export interface OutputConfig {
  /** Emit ANSI colors. */
  color: boolean;
  /** Suppress informational lines and progress. */
  quiet: boolean;
  /** Print per-file detail lines. */
  verbose: boolean;
  /** Machine-readable mode: only the final JSON document goes to stdout. */
  json: boolean;
}

export type OutputStream = "stdout" | "stderr";

/** Receives every rendered line, newline included. */
export type OutputSink = (text: string, stream: OutputStream) => void;

export interface ProgressReporter {
  tick(label?: string): void;
  stop(): void;
}

const defaultSink: OutputSink = (text, stream) => {
  if (stream === "stderr") process.stderr.write(text);
  else process.stdout.write(text);
};

/**
 * Build an output configuration, defaulting color to "stdout is a TTY and
 * NO_COLOR is unset".
 */
export function resolveOutputConfig(partial: Partial<OutputConfig> = {}): OutputConfig {
  const colorDefault = Boolean(process.stdout.isTTY) && process.env["NO_COLOR"] === undefined;
  return {
    color: partial.color ?? colorDefault,
    quiet: partial.quiet ?? false,
    verbose: partial.verbose ?? false,
    json: partial.json ?? false,
  };
}

export class Output {
  readonly config: OutputConfig;
  private readonly chalk: ChalkInstance;
  private readonly sink: OutputSink;
  private readonly customSink: boolean;

  constructor(config: Partial<OutputConfig> = {}, sink?: OutputSink) {
    this.config = resolveOutputConfig(config);
    this.chalk = new Chalk({ level: this.config.color ? 1 : 0 });
    this.sink = sink ?? defaultSink;
    this.customSink = sink !== undefined;
  }

  private get silent(): boolean {
    return this.config.quiet || this.config.json;
  }

  private emit(text: string, stream: OutputStream = "stdout"): void {
    this.sink(`${text}\n`, stream);
  }

  success(message: string): void {
    if (this.config.json) return;
    this.emit(this.chalk.green(`✅ ${message}`));
  }

  error(message: string): void {
    this.emit(this.chalk.red(`❌ ${message}`), "stderr");
  }

  warning(message: string): void {
    this.emit(this.chalk.yellow(`⚠️  ${message}`), "stderr");
  }

  info(message: string): void {
    if (this.silent) return;
    this.emit(this.chalk.blue(`ℹ️  ${message}`));
  }

  header(message: string): void {
    if (this.silent) return;
    this.emit(this.chalk.bold(`\n${message}`));
  }

  /** Verbose-only detail line. */
  detail(message: string): void {
    if (this.silent || !this.config.verbose) return;
    this.emit(this.chalk.dim(`   ${message}`));
  }

  /** Unstyled line, printed regardless of quiet mode (used for JSON documents). */
  raw(text: string): void {
    this.emit(text);
  }

  /** Plain line, suppressed in quiet/json mode. */
  line(text = ""): void {
    if (this.silent) return;
    this.emit(text);
  }

  /**
   * Progress over a known number of steps.
   *
   * Renders a bar on an interactive terminal, otherwise a
   * `Progress: n/total` line every 10 steps.
   */
  progress(total: number, label: string): ProgressReporter {
    if (this.silent || total === 0) {
      return { tick: () => undefined, stop: () => undefined };
    }

    if (!this.customSink && process.stdout.isTTY) {
      const bar = new SingleBar(
        { format: `${label} [{bar}] {value}/{total} {item}`, hideCursor: true },
        Presets.shades_classic,
      );
      bar.start(total, 0, { item: "" });
      return {
        tick: (item = "") => bar.increment(1, { item }),
        stop: () => bar.stop(),
      };
    }

    let done = 0;
    return {
      tick: () => {
        done++;
        if (done % 10 === 0 || done === total) {
          this.emit(this.chalk.dim(`   Progress: ${done}/${total}`));
        }
      },
      stop: () => undefined,
    };
  }
}

/**
 * Output that records lines instead of printing them. Used by tests and by
 * callers that embed operations.
 */
export function createBufferedOutput(config: Partial<OutputConfig> = {}): {
  output: Output;
  lines: string[];
  errors: string[];
} {
  const lines: string[] = [];
  const errors: string[] = [];
  const output = new Output({ color: false, ...config }, (text, stream) => {
    const line = text.endsWith("\n") ? text.slice(0, -1) : text;
    if (stream === "stderr") errors.push(line);
    else lines.push(line);
  });
  return { output, lines, errors };
}
