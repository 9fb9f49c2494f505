/**
 * @fileoverview Shell Theme
 *
 * Colour styles for prompt, output and errors. Uses chalk, which drops
 * colour on its own when the output is not a terminal.
 */
import chalk, { Chalk, type ChalkInstance } from 'chalk';

// =============================================================================
// Palette
// =============================================================================

export const palette = {
  bone: '#e8e2d0',
  ghost: '#9aa5b1',
  necrotic: '#7fd18b',
  blood: '#e5484d',
  ember: '#f5a524',
} as const;

// =============================================================================
// Theme
// =============================================================================

type Style = (text: string) => string;

export interface ShellTheme {
  prompt: Style;
  output: Style;
  muted: Style;
  heading: Style;
  errorLabel: Style;
  error: Style;
  warning: Style;
}

export function createTheme(colors: ChalkInstance = chalk): ShellTheme {
  return {
    prompt: colors.hex(palette.necrotic).bold,
    output: colors.hex(palette.bone),
    muted: colors.hex(palette.ghost),
    heading: colors.hex(palette.necrotic).bold,
    errorLabel: colors.hex(palette.blood).bold,
    error: colors.hex(palette.blood),
    warning: colors.hex(palette.ember),
  };
}

export const defaultTheme: ShellTheme = createTheme();

/** No escape codes, for pipes and tests */
export const plainTheme: ShellTheme = createTheme(new Chalk({ level: 0 }));
