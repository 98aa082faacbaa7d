import { QuestionError } from "../errors.js";
import type { TextResult } from "../formTypes.js";
import { getButton, isPrintable, KEY_CTRL_V } from "../navigation.js";
import { readKey } from "../rawInput.js";
import { Question, type RenderContext } from "./question.js";

export const DEFAULT_CHARACTER_LIMIT = 128;

export type TextQuestionOptions = {
  characterLimit?: number;
  /** The whole answer must match. */
  pattern?: string | RegExp;
};

/**
 * A free text question accepting characters between ASCII 32 (' ') and 126 ('~').
 */
export class TextQuestion extends Question {
  readonly type = "text" as const;
  readonly characterLimit: number;
  readonly pattern: RegExp | null;

  private input = "";

  constructor(id: string, title: string, description = "", options: TextQuestionOptions = {}) {
    super(id, title, description);
    const limit = options.characterLimit ?? DEFAULT_CHARACTER_LIMIT;
    if (!Number.isInteger(limit) || limit < 1) {
      throw new QuestionError(`Invalid character limit ${limit}, must be a positive integer.`, this);
    }
    this.characterLimit = limit;
    this.pattern = options.pattern === undefined ? null : anchored(options.pattern);
  }

  resetState(): void {
    this.assertNotSubmitted("reset state");
    this.input = "";
  }

  setInput(text: string): void {
    this.assertNotSubmitted("set input");
    if (text.length > this.characterLimit) {
      throw new QuestionError("Cannot set input, input exceeds the character limit.", this);
    }
    this.input = text;
  }

  getInput(): string {
    return this.input;
  }

  /** Appends the printable part of `text`, cut off at the character limit. */
  paste(text: string): void {
    this.assertNotSubmitted("paste");
    const printable = [...text].filter((char) => isPrintable(char.charCodeAt(0))).join("");
    this.input = (this.input + printable).slice(0, this.characterLimit);
  }

  toResult(): TextResult {
    return Object.freeze({ type: this.type, id: this.id, value: this.input });
  }

  async render(context: RenderContext): Promise<void> {
    const { style } = context;
    for (;;) {
      const matches = this.input.trim().length === 0 || this.matchesPattern();
      const shown = matches ? this.input : style.red(this.input);
      this.draw(
        context,
        this.panel(style, ["[ENTER]: Submit"]),
        style.gray(`Enter Text (${this.input.length}/${this.characterLimit}): `) + shown,
      );

      const code = await readKey(context.input);
      const button = getButton(code);
      if (isPrintable(code) && this.input.length < this.characterLimit) {
        this.input += String.fromCharCode(code);
      } else if (button === "backspace") {
        this.input = this.input.slice(0, -1);
      } else if (code === KEY_CTRL_V) {
        await this.pasteFromClipboard(context);
      } else if (button === "submit" && this.submittable()) {
        this.submit(context.navigator);
        return;
      }
    }
  }

  protected validateSubmission(): void {
    if (this.input.trim().length === 0) {
      throw new QuestionError("Cannot submit, input is empty or blank!", this);
    }
    if (this.input.length > this.characterLimit) {
      throw new QuestionError("Cannot submit, input exceeds the character limit!", this);
    }
    if (!this.matchesPattern()) {
      throw new QuestionError("Cannot submit, input does not match the required pattern!", this);
    }
  }

  private submittable(): boolean {
    return this.input.trim().length > 0 && this.matchesPattern();
  }

  private matchesPattern(): boolean {
    return this.pattern === null || this.pattern.test(this.input);
  }

  private async pasteFromClipboard(context: RenderContext): Promise<void> {
    let text: string;
    try {
      text = await context.clipboard();
    } catch (error) {
      // paste is best effort, the input stays as it was
      context.logger.debug("Clipboard paste failed", { questionId: this.id, error: String(error) });
      return;
    }
    this.paste(text);
  }
}

function anchored(pattern: string | RegExp): RegExp {
  const source = typeof pattern === "string" ? pattern : pattern.source;
  const flags = typeof pattern === "string" ? "" : pattern.flags.replace(/[gy]/g, "");
  return new RegExp(`^(?:${source})$`, flags);
}
