export const Colors = {
  red: '\x1b[91m',
  green: '\x1b[92m',
  yellow: '\x1b[93m',
  blue: '\x1b[94m',
  magenta: '\x1b[95m',
  cyan: '\x1b[96m',
  white: '\x1b[97m',
  bold: '\x1b[1m',
  underline: '\x1b[4m',
  reset: '\x1b[0m',
} as const;

export type ColorName = Exclude<keyof typeof Colors, 'reset'>;

export type Painter = (text: string, ...styles: ColorName[]) => string;

export function createPainter(enabled: boolean): Painter {
  if (!enabled) {
    return (text) => text;
  }
  return (text, ...styles) => (styles.length ? `${styles.map((s) => Colors[s]).join('')}${text}${Colors.reset}` : text);
}
