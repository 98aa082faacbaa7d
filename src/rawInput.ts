import type winston from "winston";
import { FormCancelledError, TerminalIOError } from "./errors.js";
import { getLogger } from "./logger.js";
import {
  END_OF_INPUT,
  KEY_ARROW_DOWN,
  KEY_ARROW_LEFT,
  KEY_ARROW_RIGHT,
  KEY_ARROW_UP,
  KEY_CTRL_C,
  KEY_CTRL_X,
  NO_DATA,
} from "./navigation.js";

/**
 * Source of single keystrokes. `read` resolves with a character code,
 * NO_DATA or END_OF_INPUT.
 */
export interface KeyInput {
  read(wait: boolean): Promise<number>;
  /** Reads one line with the terminal in line mode, without the line terminator. */
  readLine(): Promise<string>;
  /** Restores the terminal mode captured before the first read. */
  resetMode(): void;
  /** Restores the terminal and stops consuming the stream. */
  close(): void;
}

export type TerminalInputStream = NodeJS.ReadableStream & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

const ESCAPE_SEQUENCES = new Map<string, number>([
  ["\x1b[A", KEY_ARROW_UP],
  ["\x1b[B", KEY_ARROW_DOWN],
  ["\x1b[C", KEY_ARROW_RIGHT],
  ["\x1b[D", KEY_ARROW_LEFT],
  ["\x1bOA", KEY_ARROW_UP],
  ["\x1bOB", KEY_ARROW_DOWN],
  ["\x1bOC", KEY_ARROW_RIGHT],
  ["\x1bOD", KEY_ARROW_LEFT],
]);

/** Splits decoded stdin text into key codes, folding arrow-key escape sequences into extended codes. */
export function decodeKeys(text: string): number[] {
  const codes: number[] = [];
  let i = 0;
  while (i < text.length) {
    if (text[i] === "\x1b") {
      const extended = ESCAPE_SEQUENCES.get(text.slice(i, i + 3));
      if (extended !== undefined) {
        codes.push(extended);
        i += 3;
        continue;
      }
    }
    const codePoint = text.codePointAt(i) ?? 0;
    codes.push(codePoint);
    i += codePoint > 0xffff ? 2 : 1;
  }
  return codes;
}

const INCOMPLETE_ESCAPES = ["\x1b[", "\x1bO", "\x1b"];

/**
 * Splits off a trailing escape sequence that may continue in the next chunk.
 * Returns the text that can be decoded now and the held-back tail.
 */
export function splitIncompleteEscape(text: string): [string, string] {
  for (const tail of INCOMPLETE_ESCAPES) {
    if (text.endsWith(tail)) return [text.slice(0, -tail.length), tail];
  }
  return [text, ""];
}

function isExtendedKey(code: number): boolean {
  return code >= 0xe000 && code <= 0xe0ff;
}

export class RawTerminalInput implements KeyInput {
  private readonly pending: number[] = [];
  private waiter: (() => void) | null = null;
  private failure: { error: unknown } | null = null;
  private ended = false;
  private attached = false;
  private originalRaw: boolean | null = null;
  private rawActive = false;
  private exitHooked = false;
  private partial = "";

  constructor(
    private readonly stream: TerminalInputStream = process.stdin,
    private readonly logger: winston.Logger = getLogger(),
  ) {}

  /** Whether the stream is a terminal whose mode can be switched. */
  get isConsole(): boolean {
    return this.stream.isTTY === true && typeof this.stream.setRawMode === "function";
  }

  async read(wait: boolean): Promise<number> {
    this.attach();
    this.enterRawMode();
    const code = await this.next(wait);
    if (code === KEY_CTRL_C || code === KEY_CTRL_X) {
      this.resetMode();
      throw new FormCancelledError("interrupt");
    }
    return code;
  }

  async readLine(): Promise<string> {
    this.attach();
    this.resetMode();
    let line = "";
    for (;;) {
      const code = await this.next(true);
      if (code === END_OF_INPUT) {
        if (line.length === 0) throw new FormCancelledError("end-of-input");
        return line;
      }
      if (code === KEY_CTRL_C || code === KEY_CTRL_X) throw new FormCancelledError("interrupt");
      if (code === 13) {
        if (this.pending[0] === 10) this.pending.shift();
        return line;
      }
      if (code === 10) return line;
      if (!isExtendedKey(code)) line += String.fromCodePoint(code);
    }
  }

  resetMode(): void {
    if (!this.isConsole || !this.rawActive) return;
    this.setRaw(this.originalRaw ?? false);
    this.rawActive = false;
    this.logger.debug("Terminal mode restored");
  }

  close(): void {
    this.resetMode();
    if (this.exitHooked) {
      process.off("exit", this.restoreOnExit);
      this.exitHooked = false;
    }
    if (!this.attached) return;
    this.stream.off("data", this.onData);
    this.stream.off("end", this.onEnd);
    this.stream.off("error", this.onError);
    this.stream.pause();
    this.attached = false;
  }

  private attach(): void {
    if (this.attached) return;
    this.attached = true;
    this.stream.setEncoding("utf8");
    this.stream.on("data", this.onData);
    this.stream.on("end", this.onEnd);
    this.stream.on("error", this.onError);
    this.stream.resume();
  }

  private enterRawMode(): void {
    if (!this.isConsole || this.rawActive) return;
    if (this.originalRaw === null) {
      this.originalRaw = this.stream.isRaw === true;
      this.logger.debug("Captured original terminal mode", { raw: this.originalRaw });
    }
    if (!this.exitHooked) {
      // a process that exits while a read is pending must not leave the terminal raw
      process.on("exit", this.restoreOnExit);
      this.exitHooked = true;
    }
    this.setRaw(true);
    this.rawActive = true;
  }

  private setRaw(mode: boolean): void {
    try {
      this.stream.setRawMode?.(mode);
    } catch (error) {
      throw new TerminalIOError(`Failed to ${mode ? "enable" : "disable"} raw terminal mode`, error);
    }
  }

  private async next(wait: boolean): Promise<number> {
    for (;;) {
      const code = this.pending.shift();
      if (code !== undefined) return code;
      if (this.failure) throw new TerminalIOError("Failed to read from terminal", this.failure.error);
      if (this.ended) return END_OF_INPUT;
      if (!wait) return NO_DATA;
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }

  private readonly onData = (chunk: string | Buffer): void => {
    const text = this.partial + (typeof chunk === "string" ? chunk : chunk.toString("utf8"));
    const [complete, rest] = splitIncompleteEscape(text);
    this.partial = rest;
    this.pending.push(...decodeKeys(complete));
    this.wake();
  };

  private readonly onEnd = (): void => {
    this.pending.push(...decodeKeys(this.partial));
    this.partial = "";
    this.ended = true;
    this.wake();
  };

  private readonly restoreOnExit = (): void => {
    this.resetMode();
  };

  private readonly onError = (error: unknown): void => {
    this.logger.error("Terminal input stream failed", { error });
    this.failure = { error };
    this.wake();
  };
}

/** Waits for one keystroke; end of input cancels the form. */
export async function readKey(input: KeyInput): Promise<number> {
  const code = await input.read(true);
  if (code === END_OF_INPUT) throw new FormCancelledError("end-of-input");
  return code;
}
