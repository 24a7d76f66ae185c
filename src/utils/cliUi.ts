const RESET = "\u001b[0m";

export type ColorMode = "auto" | "always" | "never";

const colorModes: readonly ColorMode[] = ["auto", "always", "never"];

let colorMode: ColorMode = "auto";

function isTruthyFlag(value: string): boolean {
  return ["1", "true"].includes(value.toLowerCase());
}

function detectAutoColor(): boolean {
  if (process.env.NO_COLOR && isTruthyFlag(process.env.NO_COLOR)) {
    return false;
  }
  // CF_COLOR is the cf client's own color switch.
  if (process.env.CF_COLOR) {
    return isTruthyFlag(process.env.CF_COLOR);
  }
  if (process.env.FORCE_COLOR && process.env.FORCE_COLOR !== "0") {
    return true;
  }
  return Boolean(process.stdout?.isTTY);
}

function colorEnabled(): boolean {
  if (colorMode === "always") {
    return true;
  }
  if (colorMode === "never") {
    return false;
  }
  return detectAutoColor();
}

function apply(code: string, text: string): string {
  if (!colorEnabled()) {
    return text;
  }
  return `\u001b[${code}m${text}${RESET}`;
}

export function isColorMode(value: string): value is ColorMode {
  return colorModes.some((mode) => mode === value);
}

export function setColorMode(mode: ColorMode): void {
  colorMode = mode;
}

export function getColorMode(): ColorMode {
  return colorMode;
}

export const colors = {
  bold: (text: string) => apply("1", text),
  dim: (text: string) => apply("2", text),
  red: (text: string) => apply("31", text),
  yellow: (text: string) => apply("33", text),
  cyan: (text: string) => apply("36", text),
};

/** Names of brokers, plans, instances, orgs, spaces and users. */
export function formatEntity(name: string): string {
  return colors.cyan(name);
}

export function formatFailure(message: string, cause?: string): string {
  const marker = colors.bold(colors.red("FAILED"));
  const detail = cause ? `. Error: ${cause}` : "";
  return `${marker}: ${message}${detail}\n`;
}

export function formatWarning(message: string): string {
  return `${colors.yellow(message)}\n`;
}

export function formatNote(text: string): string {
  return colors.dim(text);
}
