import chalk from 'chalk';

/** Severity of a line written to stderr. */
export enum MessageType {
  DEBUG = 'debug',
  INFO = 'info',
  SUCCESS = 'success',
  WARNING = 'warning',
}

export const MESSAGE_ICONS = {
  DEBUG: '·',
  INFO: 'ℹ',
  SUCCESS: '✓',
  WARNING: '⚠',
} as const;

interface MessageStyle {
  icon: string;
  color: (text: string) => string;
}

const MESSAGE_STYLES: Record<MessageType, MessageStyle> = {
  [MessageType.DEBUG]: { icon: MESSAGE_ICONS.DEBUG, color: chalk.gray },
  [MessageType.INFO]: { icon: MESSAGE_ICONS.INFO, color: chalk.blueBright },
  [MessageType.SUCCESS]: { icon: MESSAGE_ICONS.SUCCESS, color: chalk.greenBright },
  [MessageType.WARNING]: { icon: MESSAGE_ICONS.WARNING, color: chalk.yellowBright },
};

const ICON_SPACING = '  ';

/**
 * Prefixes a message with the colored icon of its type. The text itself keeps the terminal color,
 * except for debug lines, which are dimmed entirely.
 */
export function formatMessage(message: string, type: MessageType): string {
  const style = MESSAGE_STYLES[type];
  const text = type === MessageType.DEBUG ? style.color(message) : message;
  return `${style.color(style.icon)}${ICON_SPACING}${text}`;
}

/**
 * Writes a formatted line to stderr; stdout carries only the debate transcript.
 */
export function logMessage(message: string, type: MessageType): void {
  console.error(formatMessage(message, type));
}

export function logDebug(message: string): void {
  logMessage(message, MessageType.DEBUG);
}

export function logInfo(message: string): void {
  logMessage(message, MessageType.INFO);
}

export function logSuccess(message: string): void {
  logMessage(message, MessageType.SUCCESS);
}

export function logWarning(message: string): void {
  logMessage(message, MessageType.WARNING);
}

/** Writes raw text to stderr without formatting or a trailing newline. */
export function writeStderr(message: string): void {
  process.stderr.write(message);
}
