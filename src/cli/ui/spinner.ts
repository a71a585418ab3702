import ora from 'ora';

// ── Progress Spinner ────────────────────────────────────────────────────────
// Animated on a TTY via `ora`; plain one-line-per-update output otherwise.
// Always stderr, so stdout carries only the run's status lines.

export interface SpinnerHandle {
  update(text: string): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  warn(text?: string): void;
  stop(): void;
}

export interface SpinnerOptions {
  /** Static lines only; set for `--quiet` and `--verbose`, where log lines would tear the spinner. */
  static?: boolean;
  stream?: NodeJS.WritableStream;
}

export function startSpinner(text: string, opts: SpinnerOptions = {}): SpinnerHandle {
  const stream = opts.stream ?? process.stderr;
  if (opts.static || !process.stderr.isTTY) return staticSpinner(text, stream);

  // ora turns itself off when CI is set; stderr is known to be a TTY here.
  const spinner = ora({ text, stream, spinner: 'dots', indent: 2, isEnabled: true }).start();
  return {
    update: (t) => {
      spinner.text = t;
    },
    succeed: (t) => void spinner.succeed(t ?? spinner.text),
    fail: (t) => void spinner.fail(t ?? spinner.text),
    warn: (t) => void spinner.warn(t ?? spinner.text),
    stop: () => void spinner.stop()
  };
}

function staticSpinner(text: string, stream: NodeJS.WritableStream): SpinnerHandle {
  const line = (mark: string, t: string | undefined) => {
    if (t) stream.write(`  ${mark}${t}\n`);
  };
  line('', text);
  return {
    update: (t) => line('', t),
    succeed: (t) => line('✔ ', t),
    fail: (t) => line('✖ ', t),
    warn: (t) => line('⚠ ', t),
    stop: () => undefined
  };
}
