/** Returned by a non-waiting read when no keystroke is pending. */
export const NO_DATA = -2;
/** Returned once the input stream has ended. */
export const END_OF_INPUT = -1;

/**
 * Extended key codes for arrow keys: 0xE000 plus the console scan code.
 */
export const KEY_ARROW_UP = 0xe048;
export const KEY_ARROW_DOWN = 0xe050;
export const KEY_ARROW_LEFT = 0xe04b;
export const KEY_ARROW_RIGHT = 0xe04d;

export const KEY_CTRL_C = 3;
export const KEY_CTRL_V = 22;
export const KEY_CTRL_X = 24;

export type NavigationButton =
  | "up"
  | "down"
  | "toggle"
  | "submit"
  | "backspace"
  | "numeral"
  | "exit"
  | "invalid";

export function getButton(code: number): NavigationButton {
  if (code >= 48 && code <= 57) return "numeral";

  switch (code) {
    case 119:
    case 87:
    case KEY_ARROW_UP:
      return "up";
    case 115:
    case 83:
    case KEY_ARROW_DOWN:
      return "down";
    case 32:
      return "toggle";
    case 10:
    case 13:
      return "submit";
    case 8:
    case 127:
      return "backspace";
    case KEY_CTRL_C:
    case KEY_CTRL_X:
      return "exit";
    default:
      return "invalid";
  }
}

export function isPrintable(code: number): boolean {
  return code >= 32 && code <= 126;
}
