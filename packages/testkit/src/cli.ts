/**
 * CLI testing utilities
 */

/**
 * Streams for running the CLI in process; shaped like the CLI's `CliIo`
 */
export interface CapturedIo {
  out(text: string): void;
  err(text: string): void;
  readStdin(): Promise<string>;
  isStdinTTY(): boolean;
  confirm(question: string): Promise<boolean>;
  colors: boolean;
  /** Everything written to stdout */
  readonly stdout: string;
  /** Everything written to stderr */
  readonly stderr: string;
  /** Questions asked through `confirm` */
  readonly questions: string[];
}

export interface CaptureOptions {
  /** Piped stdin; leave out to act as an interactive terminal */
  stdin?: string;
  /** Answer to every confirmation (default: false) */
  confirm?: boolean;
}

/**
 * Collect CLI output in memory
 */
export function captureIo(options: CaptureOptions = {}): CapturedIo {
  let stdout = "";
  let stderr = "";
  const questions: string[] = [];

  return {
    out: (text) => {
      stdout += text;
    },
    err: (text) => {
      stderr += text;
    },
    readStdin: async () => options.stdin ?? "",
    isStdinTTY: () => options.stdin === undefined,
    confirm: async (question) => {
      questions.push(question);
      return options.confirm ?? false;
    },
    colors: false,
    get stdout() {
      return stdout;
    },
    get stderr() {
      return stderr;
    },
    questions,
  };
}

/**
 * Parse JSON output from CLI
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
