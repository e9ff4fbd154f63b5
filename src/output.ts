// CHANGE: Format matches and diagnostics for concurrent repository searches.
// WHY: Each message is rendered completely and handed to its stream in a single write, so lines from
// different repositories never interleave.

import { Chalk, type ChalkInstance } from "chalk";
import { Repository } from "./types.js";
import { blobUrl } from "./utils/url.js";

/**
 * Minimal writable surface used by the sink; `process.stdout` and test buffers both satisfy it.
 */
export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * @property host - Web host used for hyperlinks, e.g. `github.com`.
 * @property colorize - Emit ANSI colors.
 * @property hyperlinks - Wrap matches in OSC 8 hyperlinks to their blob URL.
 */
export interface OutputOptions {
  readonly stdout: TextSink;
  readonly stderr: TextSink;
  readonly host: string;
  readonly colorize: boolean;
  readonly hyperlinks: boolean;
}

/**
 * Wrap text in an OSC 8 terminal hyperlink.
 */
export function makeHyperlink(url: string, text: string): string {
  return `\u001b]8;;${url}\u001b\\${text}\u001b]8;;\u001b\\`;
}

export class Output {
  private readonly color: ChalkInstance;

  constructor(private readonly options: OutputOptions) {
    this.color = new Chalk({ level: options.colorize ? 1 : 0 });
  }

  private emit(stream: TextSink, line: string): void {
    stream.write(`${line}\n`);
  }

  /**
   * Write one match as `owner/name:path` to stdout.
   */
  match(repository: Pick<Repository, "owner" | "name" | "ref">, path: string): void {
    let formatted = `${this.color.cyan(repository.owner)}/${this.color.green.bold(repository.name)}:${this.color.white(path)}`;
    if (this.options.hyperlinks) {
      const url = blobUrl(this.options.host, repository.owner, repository.name, repository.ref, path);
      formatted = makeHyperlink(url, formatted);
    }
    this.emit(this.options.stdout, formatted);
  }

  /**
   * Write a recoverable problem as `Warning: <message>` to stderr.
   */
  warning(message: string): void {
    this.emit(this.options.stderr, `${this.color.yellow("Warning: ")}${message}`);
  }

  info(message: string): void {
    this.emit(this.options.stderr, message);
  }
}
