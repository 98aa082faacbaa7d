import { QuestionError } from "../errors.js";
import type { CheckboxesResult } from "../formTypes.js";
import { getButton } from "../navigation.js";
import { readKey } from "../rawInput.js";
import { assertChoices } from "./multipleChoiceQuestion.js";
import { Question, type RenderContext } from "./question.js";

/**
 * A question with choices that can each be checked or unchecked. Any number
 * of choices, including none, may be submitted.
 */
export class CheckboxesQuestion extends Question {
  readonly type = "checkboxes" as const;
  readonly choices: readonly string[];

  private readonly checked: Map<string, boolean>;
  private cursor = 0;

  constructor(id: string, title: string, description: string, choices: readonly string[]) {
    super(id, title, description);
    assertChoices(this, choices);
    this.choices = [...choices];
    this.checked = new Map(choices.map((choice) => [choice, false]));
  }

  resetState(): void {
    this.assertNotSubmitted("reset state");
    this.cursor = 0;
    for (const choice of this.choices) this.checked.set(choice, false);
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

  toggle(choice: string): void {
    this.assertNotSubmitted("toggle choice");
    const current = this.checked.get(choice);
    if (current === undefined) {
      throw new QuestionError(`Cannot toggle choice, valid choices don't contain specified choice: "${choice}"`, this);
    }
    this.checked.set(choice, !current);
  }

  isChecked(choice: string): boolean {
    return this.checked.get(choice) ?? false;
  }

  /** Checked labels in configuration order. */
  getInput(): string[] {
    return this.choices.filter((choice) => this.checked.get(choice) === true);
  }

  toResult(): CheckboxesResult {
    return Object.freeze({ type: this.type, id: this.id, value: Object.freeze(this.getInput()) });
  }

  async render(context: RenderContext): Promise<void> {
    const { style } = context;
    for (;;) {
      const lines = this.panel(style, ["[W]: Up", "[S]: Down", "[SPACE]: Toggle", "[ENTER]: Submit"]);
      this.choices.forEach((label, index) => {
        const box = this.isChecked(label) ? "[x]" : "[ ]";
        lines.push(`${box} ${index === this.cursor ? style.highlight(label) : label}`);
      });
      this.draw(context, lines);

      switch (getButton(await readKey(context.input))) {
        case "up":
          this.up();
          break;
        case "down":
          this.down();
          break;
        case "toggle":
          this.toggle(this.choices[this.cursor]);
          break;
        case "submit":
          this.submit(context.navigator);
          return;
        default:
          break;
      }
    }
  }

  protected validateSubmission(): void {
    // an empty selection is a valid answer
  }
}
