import pc from "picocolors";
import { describeError } from "../lib/errors.js";

const PREFIX = "[semantic]";

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

const consoleSink: LogSink = {
  // eslint-disable-next-line no-console
  out: line => console.log(line),
  // eslint-disable-next-line no-console
  err: line => console.error(line),
};

export class LoggingService {
  verbose: boolean;
  private readonly sink: LogSink;

  constructor(verbose = false, sink: LogSink = consoleSink) {
    this.verbose = verbose;
    this.sink = sink;
  }

  log(message: string) {
    if (this.verbose) {
      this.sink.err(pc.dim(`${PREFIX} ${message}`));
    }
  }

  error(message: string) {
    this.sink.err(pc.red(message));
  }

  hint(message: string) {
    this.sink.err(pc.dim(message));
  }

  info(message: string) {
    this.sink.out(message);
  }

  /** Prints a failure with its hint on the error stream. */
  failure(error: unknown, heading?: string) {
    const [first, ...rest] = describeError(error, heading);
    this.error(first);
    for (const line of rest) this.hint(line);
  }
}
