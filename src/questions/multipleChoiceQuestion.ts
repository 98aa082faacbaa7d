import { QuestionError } from "../errors.js";
import type { MultipleChoiceResult } from "../formTypes.js";
import { getButton } from "../navigation.js";
import { readKey } from "../rawInput.js";
import { Question, type RenderContext } from "./question.js";

export function assertChoices(question: Question, choices: readonly string[]): void {
  if (choices.length === 0) {
    throw new QuestionError("Invalid choices, at least one choice is required.", question);
  }
  if (new Set(choices).size !== choices.length) {
    throw new QuestionError("Invalid choices, choices must be unique.", question);
  }
}

/**
 * A question with a list of choices of which exactly one is picked.
 */
export class MultipleChoiceQuestion extends Question {
  readonly type = "multipleChoice" as const;
  readonly choices: readonly string[];

  private cursor = 0;
  private choice: string | undefined;

  constructor(id: string, title: string, description: string, choices: readonly string[]) {
    super(id, title, description);
    assertChoices(this, choices);
    this.choices = [...choices];
  }

  resetState(): void {
    this.assertNotSubmitted("reset state");
    this.cursor = 0;
    this.choice = undefined;
  }

  getCursor(): number {
    return this.cursor;
  }

  up(): void {
    this.assertNotSubmitted("move cursor");
    if (this.cursor > 0) this.cursor--;
  }

  down(): void {
    this.assertNotSubmitted("move cursor");
    if (this.cursor < this.choices.length - 1) this.cursor++;
  }

  /** Picks a choice by label or by index. */
  choose(choice: string | number): void {
    this.assertNotSubmitted("choose");
    const label = typeof choice === "number" ? this.choices[choice] : choice;
    if (label === undefined || !this.choices.includes(label)) {
      throw new QuestionError(`Cannot choose, valid choices don't contain specified choice: "${choice}"`, this);
    }
    this.choice = label;
  }

  getInput(): string | undefined {
    return this.choice;
  }

  toResult(): MultipleChoiceResult {
    if (this.choice === undefined) {
      throw new QuestionError("Cannot create result, choice is not set!", this);
    }
    return Object.freeze({ type: this.type, id: this.id, value: this.choice });
  }

  async render(context: RenderContext): Promise<void> {
    const { style } = context;
    for (;;) {
      const lines = this.panel(style, ["[W]: Up", "[S]: Down", "[ENTER]: Submit"]);
      this.choices.forEach((label, index) => {
        lines.push(`-> ${index === this.cursor ? style.highlight(label) : label}`);
      });
      this.draw(context, lines);

      switch (getButton(await readKey(context.input))) {
        case "up":
          this.up();
          break;
        case "down":
          this.down();
          break;
        case "submit":
          this.choose(this.cursor);
          this.submit(context.navigator);
          return;
        default:
          break;
      }
    }
  }

  protected validateSubmission(): void {
    if (this.choice === undefined) {
      throw new QuestionError("Cannot submit, choice is not set!", this);
    }
  }
}
