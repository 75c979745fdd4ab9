import boxen, { Options as BoxenOptions } from 'boxen';
import chalk from 'chalk';

/**
 * Standard boxen configuration used across the CLI
 */
const DEFAULT_BOX_OPTIONS: Partial<BoxenOptions> = {
  padding: 1,
  margin: { top: 1, bottom: 1, left: 1, right: 1 },
  borderStyle: 'round',
  titleAlignment: 'center',
};

/**
 * Color themes for different types of displays
 */
export const DisplayThemes = {
  INFO: 'blue',
  SUCCESS: 'green',
  ERROR: 'red',
  HIGHLIGHT: 'magenta',
} as const;

export type DisplayTheme = (typeof DisplayThemes)[keyof typeof DisplayThemes];

interface DisplayBoxOptions {
  title?: string;
  titleAlignment?: 'left' | 'center' | 'right';
  theme?: DisplayTheme;
  customBorderColor?: string;
}

/**
 * Creates a standardized boxen display with consistent styling
 */
export const createDisplayBox = (content: string, options: DisplayBoxOptions = {}): string => {
  const { theme = DisplayThemes.INFO, customBorderColor, title, titleAlignment } = options;

  const boxOptions: BoxenOptions = {
    ...DEFAULT_BOX_OPTIONS,
    borderColor: customBorderColor || theme,
    ...(title ? { title } : {}),
    ...(titleAlignment ? { titleAlignment } : {}),
  };

  return boxen(content, boxOptions);
};

/**
 * Displays a boxen to console with standard formatting
 */
export const displayBox = (content: string, options: DisplayBoxOptions = {}): void => {
  console.log(createDisplayBox(content, options));
};

/**
 * Creates formatted label-value pairs commonly used in command outputs
 */
export const formatLabelValue = (label: string, value: string): string => {
  return `${chalk.bold.cyan(`${label}:`)} ${value}`;
};

/**
 * Creates a separator line
 */
export const createSeparator = (length: number = 50, char: string = '─'): string => {
  return chalk.gray(char.repeat(length));
};

/**
 * Pre-configured display functions for common use cases
 */
export const display = {
  success: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.SUCCESS, title }),

  error: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.ERROR, title }),

  info: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.INFO, title, titleAlignment: 'left' }),

  highlight: (content: string, title: string) =>
    displayBox(content, { theme: DisplayThemes.HIGHLIGHT, title }),
};
