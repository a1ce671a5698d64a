import type { ProviderId } from "@spendtop/shared";

export const ANSI_COLOR_NAMES = [
  "black",
  "red",
  "green",
  "yellow",
  "blue",
  "magenta",
  "cyan",
  "white",
  "gray",
  "darkGray",
  "lightBlue",
] as const;

export type AnsiColorName = (typeof ANSI_COLOR_NAMES)[number];

export type HexColor = `#${string}`;

export type TerminalColor = AnsiColorName | HexColor;

export type Palette = {
  primary: TerminalColor;
  accent: TerminalColor;
  error: TerminalColor;
  selectedBg: TerminalColor;
  selectedFg: TerminalColor;
  chartColors: readonly TerminalColor[];
};

const openAiPalette: Palette = {
  primary: "cyan",
  accent: "green",
  error: "red",
  selectedBg: "cyan",
  selectedFg: "black",
  chartColors: ["blue", "cyan", "green", "magenta", "yellow", "lightBlue"],
};

const anthropicPalette: Palette = {
  primary: "#CC785C",
  accent: "#61AAF2",
  error: "#BF4D43",
  selectedBg: "#CC785C",
  selectedFg: "#FFFFFF",
  chartColors: ["#CC785C", "#D4A27F", "#EBDBBC", "#BF4D43", "#E5E4DF", "#F0F0EB"],
};

export const paletteFor = (provider: ProviderId): Palette => {
  switch (provider) {
    case "openai":
      return openAiPalette;
    case "anthropic":
      return anthropicPalette;
  }
};
