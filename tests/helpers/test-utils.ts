import { PassThrough } from "node:stream";
import { vi } from "vitest";
import { TerminalStyle, WHITE } from "../../src/ansi.js";
import type { ClipboardReader } from "../../src/clipboard.js";
import { getLogger } from "../../src/logger.js";
import type { FormNavigator, Question, RenderContext } from "../../src/questions/question.js";
import { RawTerminalInput } from "../../src/rawInput.js";

/** Input that yields `keys` and then ends. */
export function scriptedInput(keys: string): RawTerminalInput {
  const stream = new PassThrough();
  stream.end(keys);
  return new RawTerminalInput(stream);
}

/** A stream that claims to be a terminal, recording mode switches. */
export function fakeTerminal(isRaw = false) {
  return Object.assign(new PassThrough(), {
    isTTY: true,
    isRaw,
    setRawMode: vi.fn<(mode: boolean) => unknown>(),
  });
}

export class OutputCapture {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join("");
  }

  /** A drawn frame without the blank lines that stand in for clearing the screen. */
  frame(index: number): string {
    const chunk = index < 0 ? this.chunks[this.chunks.length + index] : this.chunks[index];
    return (chunk ?? "").replace(/^\n+/, "");
  }
}

export function stubNavigator(questions: Question[] = []) {
  return {
    isCurrentQuestion: vi.fn((_question: Question) => true),
    nextQuestion: vi.fn<() => void>(),
    getQuestion: vi.fn((id: string) => questions.find((question) => question.id === id)),
  } satisfies FormNavigator;
}

export function renderContext(
  keys: string,
  options: { navigator?: FormNavigator; clipboard?: ClipboardReader } = {},
): { context: RenderContext; output: OutputCapture } {
  const output = new OutputCapture();
  const context: RenderContext = {
    navigator: options.navigator ?? stubNavigator(),
    input: scriptedInput(keys),
    output,
    style: new TerminalStyle(WHITE, false),
    clipboard: options.clipboard ?? (() => Promise.resolve("")),
    logger: getLogger(),
  };
  return { context, output };
}
