import { Chalk, type ChalkInstance } from "chalk";
import wrapAnsi from "wrap-ansi";

export type ThemeColor = { r: number; g: number; b: number };

export const WHITE: ThemeColor = { r: 255, g: 255, b: 255 };

export const CLEAR_SCREEN = "\x1b[H\x1b[2J";

const HEX_COLOR = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;

export function parseHexColor(hex: string): ThemeColor {
  const match = HEX_COLOR.exec(hex);
  if (!match) throw new TypeError(`Invalid hex color: ${hex}`);
  return {
    r: parseInt(match[1], 16),
    g: parseInt(match[2], 16),
    b: parseInt(match[3], 16),
  };
}

/**
 * Windows consoles only get escape sequences when TERM names an xterm-compatible terminal.
 */
export function supportsAnsi(platform: NodeJS.Platform = process.platform, term: string | undefined = process.env.TERM): boolean {
  if (platform === "win32") {
    return term !== undefined && term.includes("xterm");
  }
  return true;
}

/** Width used for wrapping a page description: at least 50 columns, or twice the title. */
export function descriptionWidth(title: string): number {
  return Math.max(50, title.length * 2);
}

export function wrapDescription(description: string, title: string): string[] {
  if (description.trim().length === 0) return [];
  return wrapAnsi(description, descriptionWidth(title), { hard: true }).split("\n");
}

export class TerminalStyle {
  readonly chalk: ChalkInstance;

  constructor(
    readonly theme: ThemeColor = WHITE,
    readonly ansi: boolean = true,
  ) {
    this.chalk = new Chalk({ level: ansi ? 3 : 0 });
  }

  accent(text: string): string {
    return this.chalk.rgb(this.theme.r, this.theme.g, this.theme.b)(text);
  }

  heading(text: string): string {
    return this.chalk.rgb(this.theme.r, this.theme.g, this.theme.b).bold(text);
  }

  gray(text: string): string {
    return this.chalk.gray(text);
  }

  red(text: string): string {
    return this.chalk.redBright(text);
  }

  /** Cursor row in a choice list. */
  highlight(text: string): string {
    return this.chalk.black.bgWhite(text);
  }

  clear(): string {
    return this.ansi ? CLEAR_SCREEN : "\n".repeat(100);
  }
}
