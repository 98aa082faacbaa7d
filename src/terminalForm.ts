import { supportsAnsi, TerminalStyle, wrapDescription } from "./ansi.js";
import { readClipboardText, type ClipboardReader } from "./clipboard.js";
import { FormError } from "./errors.js";
import { Form, INTRO_PAGE, type FormOptions } from "./formEngine.js";
import type { FormResult } from "./formTypes.js";
import type { OutputSink } from "./questions/question.js";
import { RawTerminalInput, readKey, type KeyInput } from "./rawInput.js";

export type TerminalFormOptions = FormOptions & {
  /** Defaults to raw keystrokes from stdin. */
  input?: KeyInput;
  /** Defaults to stdout. */
  output?: OutputSink;
  /** Colours and screen clearing; detected from the platform when omitted. */
  ansi?: boolean;
  clipboard?: ClipboardReader;
};

/**
 * A form displayed in a terminal. Output must go to a terminal that
 * understands ANSI escapes, or plain text is written and the screen is
 * "cleared" with blank lines.
 */
export class TerminalForm extends Form {
  readonly input: KeyInput;
  private readonly output: OutputSink;
  private readonly ansi: boolean;
  private readonly clipboard: ClipboardReader;

  constructor(options: TerminalFormOptions) {
    super(options);
    this.input = options.input ?? new RawTerminalInput(process.stdin, this.logger);
    this.output = options.output ?? process.stdout;
    this.ansi = options.ansi ?? supportsAnsi();
    this.clipboard = options.clipboard ?? (() => readClipboardText());
  }

  /**
   * Renders one step: the intro page waits for any key, a question page runs
   * the question until it is submitted, or skips it when its requirement
   * is not met. The input is released once the form is done or a step fails,
   * and re-acquired by the next read.
   */
  async render(): Promise<void> {
    if (this.isSubmitted()) {
      throw new FormError("Cannot render, form is already done.", this);
    }
    try {
      await this.renderPage();
    } catch (error) {
      this.input.close();
      throw error;
    }
    if (this.isSubmitted()) this.input.close();
  }

  /** Renders until the form is done. */
  async run(): Promise<FormResult> {
    this.logger.info("Form started", { runId: this.runId, formId: this.id, questions: this.getQuestions().length });
    try {
      while (!this.isSubmitted()) {
        await this.render();
      }
      return this.toResult();
    } catch (error) {
      this.logger.warn("Form stopped before completion", { runId: this.runId, page: this.getPage(), error: String(error) });
      throw error;
    } finally {
      this.input.close();
    }
  }

  private async renderPage(): Promise<void> {
    const style = new TerminalStyle(this.theme, this.ansi);

    if (this.getPage() === INTRO_PAGE) {
      const lines = [style.heading(`=== ${this.title} ===`)];
      for (const line of wrapDescription(this.description, this.title)) {
        lines.push(`${style.accent("|")} ${line}`);
      }
      lines.push(style.gray("\nPress any key to continue!"));
      this.output.write(`${lines.join("\n")}\n`);
      await readKey(this.input);
      this.nextQuestion();
      return;
    }

    const question = this.currentQuestion();
    if (!question.requirementMet(this)) {
      this.skipQuestion();
      return;
    }
    await question.render({
      navigator: this,
      input: this.input,
      output: this.output,
      style,
      clipboard: this.clipboard,
      logger: this.logger,
    });
  }
}
