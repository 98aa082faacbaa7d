import { v4 as uuidv4 } from "uuid";
import type winston from "winston";
import { WHITE, type ThemeColor } from "./ansi.js";
import { FormError } from "./errors.js";
import type { FormCallback, FormResult } from "./formTypes.js";
import { getLogger } from "./logger.js";
import type { FormNavigator, Question } from "./questions/question.js";

export const INTRO_PAGE = -1;

export type FormOptions = {
  /** Set when the form was built from a definition. */
  id?: string;
  title: string;
  description?: string;
  theme?: ThemeColor;
  callback?: FormCallback;
  questions?: Question[];
  logger?: winston.Logger;
};

/**
 * An ordered sequence of questions walked one page at a time. Page -1 is the
 * intro page; once the page reaches the question count the form is done and
 * the callback fires. Pages only move forward.
 */
export abstract class Form implements FormNavigator {
  readonly id?: string;
  readonly runId: string = uuidv4();

  protected title: string;
  protected description: string;
  protected theme: ThemeColor;
  protected callback: FormCallback | undefined;
  protected readonly logger: winston.Logger;

  private readonly questions: Question[] = [];
  private readonly skipped: string[] = [];
  private page = INTRO_PAGE;
  private submitted = false;

  constructor(options: FormOptions) {
    this.id = options.id;
    this.title = options.title;
    this.description = options.description ?? "";
    this.theme = options.theme ?? WHITE;
    this.callback = options.callback;
    this.logger = options.logger ?? getLogger();
    this.addQuestions(options.questions ?? []);
  }

  getTitle(): string {
    return this.title;
  }

  /** Should not be changed while the form is displayed. */
  setTitle(title: string): this {
    this.title = title;
    return this;
  }

  getDescription(): string {
    return this.description;
  }

  setDescription(description: string): this {
    this.description = description;
    return this;
  }

  getTheme(): ThemeColor {
    return this.theme;
  }

  setTheme(theme: ThemeColor): this {
    this.theme = theme;
    return this;
  }

  getCallback(): FormCallback | undefined {
    return this.callback;
  }

  setCallback(callback: FormCallback): this {
    this.callback = callback;
    return this;
  }

  addQuestion(question: Question): this {
    if (this.getQuestion(question.id)) {
      throw new FormError(`Cannot add question, the id "${question.id}" is already used.`, this);
    }
    this.questions.push(question);
    return this;
  }

  addQuestions(questions: readonly Question[]): this {
    for (const question of questions) this.addQuestion(question);
    return this;
  }

  getQuestions(): readonly Question[] {
    return this.questions;
  }

  getQuestion(id: string): Question | undefined {
    return this.questions.find((question) => question.id === id);
  }

  getPage(): number {
    return this.page;
  }

  isSubmitted(): boolean {
    return this.submitted;
  }

  currentQuestion(): Question {
    if (this.page === INTRO_PAGE) {
      throw new FormError("Cannot get current question, still at description.", this);
    }
    const question = this.questions[this.page];
    if (this.page >= this.questions.length || !question) {
      throw new FormError("Cannot get current question, form is already done.", this);
    }
    return question;
  }

  isCurrentQuestion(question: Question): boolean {
    return this.page >= 0 && this.page < this.questions.length && this.questions[this.page] === question;
  }

  /**
   * Moves to the next page. Moving past the last question submits the form
   * and hands the aggregate result to the callback.
   */
  nextQuestion(): void {
    if (this.submitted) {
      throw new FormError("Cannot go to the next question, form is already done.", this);
    }
    this.page++;
    this.logger.debug("Form advanced", { runId: this.runId, page: this.page });
    if (this.page >= this.questions.length) {
      this.submitted = true;
      const result = this.toResult();
      this.logger.info("Form completed", {
        runId: this.runId,
        formId: this.id,
        answered: result.results.length,
        skipped: result.skipped.length,
      });
      this.callback?.(result);
    }
  }

  /** Advances past the current question without answering it. */
  skipQuestion(): void {
    const question = this.currentQuestion();
    this.skipped.push(question.id);
    this.logger.debug("Question skipped, requirement not met", { runId: this.runId, questionId: question.id });
    this.nextQuestion();
  }

  toResult(): FormResult {
    return Object.freeze({
      formId: this.id,
      runId: this.runId,
      results: Object.freeze(this.questions.filter((question) => question.isSubmitted()).map((question) => question.toResult())),
      skipped: Object.freeze([...this.skipped]),
    });
  }

  /** Renders the current page. */
  abstract render(): Promise<void>;
}
