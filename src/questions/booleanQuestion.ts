import type { BooleanResult } from "../formTypes.js";
import { Question, type RenderContext } from "./question.js";

/** First letters of "no" across languages (false, no, nein, non, nee...). */
export const FALSE_LETTERS: readonly string[] = ["f", "n"];

/** First letters of "yes" across languages (true, yes, si, ja, kyllä...). */
export const TRUE_LETTERS: readonly string[] = ["t", "y", "s", "j", "k"];

/**
 * Interprets a typed line. Blank input takes the default; `null` means the
 * line could not be understood.
 */
export function parseBooleanAnswer(line: string, defaultChoice: boolean): boolean | null {
  const trimmed = line.trim();
  if (trimmed.length === 0) return defaultChoice;
  const first = trimmed[0].toLowerCase();
  if (FALSE_LETTERS.includes(first)) return false;
  if (TRUE_LETTERS.includes(first)) return true;
  return null;
}

export type BooleanQuestionOptions = {
  defaultChoice?: boolean;
};

export class BooleanQuestion extends Question {
  readonly type = "boolean" as const;
  readonly defaultChoice: boolean;

  private choice: boolean;

  constructor(id: string, title: string, description = "", options: BooleanQuestionOptions = {}) {
    super(id, title, description);
    this.defaultChoice = options.defaultChoice ?? true;
    this.choice = this.defaultChoice;
  }

  resetState(): void {
    this.assertNotSubmitted("reset state");
    this.choice = this.defaultChoice;
  }

  setChoice(choice: boolean): void {
    this.assertNotSubmitted("set choice");
    this.choice = choice;
  }

  getInput(): boolean {
    return this.choice;
  }

  toResult(): BooleanResult {
    return Object.freeze({ type: this.type, id: this.id, value: this.choice });
  }

  /**
   * Asks on a single line, e.g. `Choice [Y|n]: ` when the default is true.
   */
  async render(context: RenderContext): Promise<void> {
    const { style } = context;
    let error = false;
    for (;;) {
      const lines = this.panel(style, ["[ENTER]: Submit"]);
      if (error) lines.push(style.red("Invalid Input! Try again:"));
      this.draw(context, lines, `Choice [${this.defaultChoice ? "Y|n" : "y|N"}]: `);

      const answer = parseBooleanAnswer(await context.input.readLine(), this.defaultChoice);
      if (answer === null) {
        error = true;
        continue;
      }
      this.setChoice(answer);
      this.submit(context.navigator);
      return;
    }
  }

  protected validateSubmission(): void {
    // any choice is a valid answer
  }
}
