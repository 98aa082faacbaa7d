import type winston from "winston";
import { wrapDescription, type TerminalStyle } from "../ansi.js";
import type { ClipboardReader } from "../clipboard.js";
import { QuestionError } from "../errors.js";
import { resultMatches } from "../formResult.js";
import type { QuestionResult, QuestionType, Requirement, RequirementValue } from "../formTypes.js";
import type { KeyInput } from "../rawInput.js";

export const QUESTION_ID_PATTERN = /^[a-z0-9_-]+$/;

/**
 * What a question needs from its form: advancing after submission and
 * looking up other questions for requirement checks.
 */
export interface FormNavigator {
  /** Whether `question` is the page currently shown. */
  isCurrentQuestion(question: Question): boolean;
  nextQuestion(): void;
  getQuestion(id: string): Question | undefined;
}

export type OutputSink = {
  write(chunk: string): unknown;
};

export type RenderContext = {
  navigator: FormNavigator;
  input: KeyInput;
  output: OutputSink;
  style: TerminalStyle;
  clipboard: ClipboardReader;
  logger: winston.Logger;
};

export abstract class Question {
  abstract readonly type: QuestionType;

  protected submitted = false;
  private requirement: Requirement | null = null;

  protected constructor(
    readonly id: string,
    readonly title: string,
    readonly description: string = "",
  ) {
    if (!QUESTION_ID_PATTERN.test(id)) {
      throw new QuestionError(`Invalid id "${id}", ids may only contain a-z, 0-9, "_" and "-".`, this);
    }
  }

  /**
   * Only ask this question when `questionId` was submitted with an answer equal to `value`.
   */
  setRequirement(questionId: string, value: RequirementValue): this {
    this.assertNotSubmitted("set requirement");
    this.requirement = { questionId, value };
    return this;
  }

  getRequirement(): Requirement | null {
    return this.requirement;
  }

  /**
   * A missing or unanswered referenced question counts as an unmet requirement.
   */
  requirementMet(navigator: FormNavigator): boolean {
    if (!this.requirement) return true;
    const question = navigator.getQuestion(this.requirement.questionId);
    if (!question || !question.isSubmitted()) return false;
    return resultMatches(question.toResult(), this.requirement.value);
  }

  isSubmitted(): boolean {
    return this.submitted;
  }

  /** Locks in the current input and advances the form. */
  submit(navigator: FormNavigator): void {
    if (this.submitted) {
      throw new QuestionError("Cannot submit, the question was already submitted!", this);
    }
    if (!navigator.isCurrentQuestion(this)) {
      throw new QuestionError("Cannot submit, the question is not the current page of the form!", this);
    }
    this.validateSubmission();
    this.submitted = true;
    navigator.nextQuestion();
  }

  /** Clears the collected input, leaving the configuration untouched. */
  abstract resetState(): void;

  abstract getInput(): unknown;

  abstract toResult(): QuestionResult;

  /** Runs the interactive loop until the question is submitted. */
  abstract render(context: RenderContext): Promise<void>;

  protected abstract validateSubmission(): void;

  protected assertNotSubmitted(action: string): void {
    if (this.submitted) {
      throw new QuestionError(`Cannot ${action}, the question was already submitted!`, this);
    }
  }

  protected panel(style: TerminalStyle, hints: string[]): string[] {
    const lines = [style.heading(`-> ${this.title} <-`)];
    for (const line of wrapDescription(this.description, this.title)) {
      lines.push(`${style.accent("|")} ${line}`);
    }
    lines.push(style.gray(`\n|| ${hints.join(" || ")} ||\n`));
    return lines;
  }

  protected draw(context: RenderContext, lines: string[], prompt = ""): void {
    context.output.write(`${context.style.clear()}${lines.join("\n")}\n${prompt}`);
  }
}
