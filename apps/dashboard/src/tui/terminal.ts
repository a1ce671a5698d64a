import readline from "node:readline";

import type { KeyPress } from "./keymap";

const ENTER_ALT_SCREEN = "\u001b[?1049h";
const LEAVE_ALT_SCREEN = "\u001b[?1049l";
const HIDE_CURSOR = "\u001b[?25l";
const SHOW_CURSOR = "\u001b[?25h";
const CLEAR_SCREEN = "\u001b[2J";

const FALLBACK_SIZE = { width: 80, height: 24 };

export type TerminalSize = {
  width: number;
  height: number;
};

export type Terminal = {
  size: () => TerminalSize;
  draw: (content: string) => void;
  onKey: (handler: (key: KeyPress) => void) => void;
  onResize: (handler: () => void) => void;
  restore: () => void;
};

type TerminalStreams = {
  input?: NodeJS.ReadStream;
  output?: NodeJS.WriteStream;
};

/**
 * Takes over the terminal: raw keyboard input, alternate screen, hidden
 * cursor. `restore` undoes all of it and may be called any number of times.
 */
export const openTerminal = ({
  input = process.stdin,
  output = process.stdout,
}: TerminalStreams = {}): Terminal => {
  const keyHandlers: Array<(key: KeyPress) => void> = [];
  const resizeHandlers: Array<() => void> = [];
  let restored = false;

  const handleKeypress = (_chunk: string | undefined, key: KeyPress | undefined) => {
    if (!key) {
      return;
    }
    keyHandlers.forEach((handler) => handler(key));
  };
  const handleResize = () => {
    resizeHandlers.forEach((handler) => handler());
  };

  readline.emitKeypressEvents(input);
  if (input.isTTY) {
    input.setRawMode(true);
  }
  input.on("keypress", handleKeypress);
  input.resume();
  output.on("resize", handleResize);
  output.write(`${ENTER_ALT_SCREEN}${HIDE_CURSOR}${CLEAR_SCREEN}`);

  const size = (): TerminalSize => ({
    width: output.columns ?? FALLBACK_SIZE.width,
    height: output.rows ?? FALLBACK_SIZE.height,
  });

  const draw = (content: string) => {
    if (!restored) {
      output.write(content);
    }
  };

  const restore = () => {
    if (restored) {
      return;
    }
    restored = true;
    input.off("keypress", handleKeypress);
    output.off("resize", handleResize);
    if (input.isTTY) {
      input.setRawMode(false);
    }
    input.pause();
    output.write(`${SHOW_CURSOR}${LEAVE_ALT_SCREEN}`);
  };

  return {
    size,
    draw,
    onKey: (handler) => {
      keyHandlers.push(handler);
    },
    onResize: (handler) => {
      resizeHandlers.push(handler);
    },
    restore,
  };
};
