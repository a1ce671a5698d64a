import type { NavigationCommand, NavigationState } from "../domain/navigation/navigation";

// Shape of the `key` argument of readline "keypress" events.
export type KeyPress = {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  meta?: boolean;
};

const isPrintable = (key: KeyPress) => {
  if (key.ctrl || key.meta || key.sequence == null) {
    return false;
  }
  const chars = Array.from(key.sequence);
  return chars.length === 1 && (chars[0]?.codePointAt(0) ?? 0) >= 0x20 && key.sequence !== "\u007f";
};

const promptCommand = (key: KeyPress, input: string): NavigationCommand | null => {
  switch (key.name) {
    case "return":
    case "enter":
      return { type: "submitCredentials", key: input };
    case "escape":
      return { type: "cancelCredentials" };
    case "backspace":
      return { type: "editCredentialInput", edit: { kind: "backspace" } };
  }
  if (isPrintable(key) && key.sequence) {
    return { type: "editCredentialInput", edit: { kind: "char", char: key.sequence } };
  }
  return null;
};

/**
 * Translates one keypress into a navigation command. While the credential
 * prompt is open every printable key goes into the prompt.
 */
export const keyToCommand = (key: KeyPress, state: NavigationState): NavigationCommand | null => {
  if (key.ctrl && key.name === "c") {
    return { type: "requestQuit" };
  }
  if (state.credentialPrompt) {
    return promptCommand(key, state.credentialPrompt.input);
  }

  switch (key.name) {
    case "left":
      return { type: "moveColumn", delta: -1 };
    case "right":
      return { type: "moveColumn", delta: 1 };
    case "up":
      return { type: "moveCursor", delta: -1 };
    case "down":
      return { type: "moveCursor", delta: 1 };
    case "return":
    case "enter":
      if (state.activeColumn === "groupBy") {
        return { type: "toggleGroupByExpansion" };
      }
      return state.activeColumn === "provider"
        ? { type: "requestRefresh", provider: state.provider }
        : null;
    case "escape":
      return state.groupByExpanded ? { type: "toggleGroupByExpansion" } : null;
    case "h":
      return { type: "scroll", delta: -1 };
    case "l":
      return { type: "scroll", delta: 1 };
    case "d":
      return { type: "toggleSegmentValues" };
    case "r":
      return { type: "requestRefresh", provider: state.provider };
    case "q":
      return { type: "requestQuit" };
    default:
      return null;
  }
};
