import type { Rect } from "../view/frame-model";
import type { AnsiColorName, HexColor, TerminalColor } from "../view/palette";

export type CellStyle = {
  fg?: TerminalColor;
  bg?: TerminalColor;
  bold?: boolean;
  dim?: boolean;
};

type Cell = {
  char: string;
  style: CellStyle;
};

const ESC = "\u001b[";

const FOREGROUND_CODES: Record<AnsiColorName, number> = {
  black: 30,
  red: 31,
  green: 32,
  yellow: 33,
  blue: 34,
  magenta: 35,
  cyan: 36,
  white: 97,
  gray: 37,
  darkGray: 90,
  lightBlue: 94,
};

const BACKGROUND_OFFSET = 10;

const isHexColor = (color: TerminalColor): color is HexColor => color.startsWith("#");

const parseHex = (color: HexColor) => {
  const value = Number.parseInt(color.slice(1), 16);
  if (color.length !== 7 || Number.isNaN(value)) {
    return null;
  }
  return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff] as const;
};

const colorCode = (color: TerminalColor, layer: "fg" | "bg") => {
  if (isHexColor(color)) {
    const rgb = parseHex(color);
    if (!rgb) {
      return null;
    }
    return `${layer === "fg" ? 38 : 48};2;${rgb[0]};${rgb[1]};${rgb[2]}`;
  }
  const base = FOREGROUND_CODES[color];
  return String(layer === "fg" ? base : base + BACKGROUND_OFFSET);
};

/**
 * SGR escape for a style, always starting from a reset so runs do not leak
 * attributes into each other.
 */
export const sgr = (style: CellStyle) => {
  const codes = ["0"];
  if (style.bold) codes.push("1");
  if (style.dim) codes.push("2");
  const fg = style.fg ? colorCode(style.fg, "fg") : null;
  if (fg) codes.push(fg);
  const bg = style.bg ? colorCode(style.bg, "bg") : null;
  if (bg) codes.push(bg);
  return `${ESC}${codes.join(";")}m`;
};

// Cuts `text` to `width` columns, marking the cut with an ellipsis.
export const clipText = (text: string, width: number) => {
  const chars = Array.from(text);
  if (width <= 0) {
    return "";
  }
  if (chars.length <= width) {
    return text;
  }
  return `${chars.slice(0, width - 1).join("")}…`;
};

const BOX = {
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
} as const;

export type ScreenBuffer = ReturnType<typeof createScreenBuffer>;

export const createScreenBuffer = (width: number, height: number) => {
  const blank = (): Cell => ({ char: " ", style: {} });
  const rows: Cell[][] = Array.from({ length: Math.max(0, height) }, () =>
    Array.from({ length: Math.max(0, width) }, blank),
  );

  const setCell = (x: number, y: number, char: string, style: CellStyle = {}) => {
    const row = rows[y];
    if (!row || x < 0 || x >= row.length) {
      return;
    }
    row[x] = { char, style };
  };

  /**
   * Writes one line of text starting at (x, y), clipped to `maxWidth` and to
   * the buffer edge. Returns the number of columns written.
   */
  const writeText = (
    x: number,
    y: number,
    text: string,
    style: CellStyle = {},
    maxWidth = width - x,
  ) => {
    const chars = Array.from(text).slice(0, Math.max(0, Math.min(maxWidth, width - x)));
    chars.forEach((char, index) => setCell(x + index, y, char, style));
    return chars.length;
  };

  const writeCentered = (rect: Rect, y: number, text: string, style: CellStyle = {}) => {
    const clipped = clipText(text, rect.width);
    const offset = Math.max(0, Math.floor((rect.width - Array.from(clipped).length) / 2));
    writeText(rect.x + offset, y, clipped, style, rect.width - offset);
  };

  const fillRect = (rect: Rect, char = " ", style: CellStyle = {}) => {
    for (let y = rect.y; y < rect.y + rect.height; y += 1) {
      for (let x = rect.x; x < rect.x + rect.width; x += 1) {
        setCell(x, y, char, style);
      }
    }
  };

  const drawBox = (
    rect: Rect,
    options: { title?: string; style?: CellStyle; titleStyle?: CellStyle } = {},
  ) => {
    if (rect.width < 2 || rect.height < 2) {
      return;
    }
    const style = options.style ?? {};
    const right = rect.x + rect.width - 1;
    const bottom = rect.y + rect.height - 1;
    for (let x = rect.x + 1; x < right; x += 1) {
      setCell(x, rect.y, BOX.horizontal, style);
      setCell(x, bottom, BOX.horizontal, style);
    }
    for (let y = rect.y + 1; y < bottom; y += 1) {
      setCell(rect.x, y, BOX.vertical, style);
      setCell(right, y, BOX.vertical, style);
    }
    setCell(rect.x, rect.y, BOX.topLeft, style);
    setCell(right, rect.y, BOX.topRight, style);
    setCell(rect.x, bottom, BOX.bottomLeft, style);
    setCell(right, bottom, BOX.bottomRight, style);
    if (options.title) {
      const title = clipText(` ${options.title} `, rect.width - 4);
      writeText(rect.x + 2, rect.y, title, options.titleStyle ?? style);
    }
  };

  const rowText = (y: number) => (rows[y] ?? []).map((cell) => cell.char).join("");

  const styleAt = (x: number, y: number): CellStyle => rows[y]?.[x]?.style ?? {};

  /**
   * Full-screen repaint: cursor home, every row with style runs, then a
   * trailing reset.
   */
  const serialize = () => {
    let output = `${ESC}H`;
    rows.forEach((row, y) => {
      output += `${ESC}${y + 1};1H`;
      let current = "";
      row.forEach((cell) => {
        const code = sgr(cell.style);
        if (code !== current) {
          output += code;
          current = code;
        }
        output += cell.char;
      });
    });
    return `${output}${ESC}0m`;
  };

  return {
    width,
    height,
    setCell,
    writeText,
    writeCentered,
    fillRect,
    drawBox,
    rowText,
    styleAt,
    serialize,
  };
};
