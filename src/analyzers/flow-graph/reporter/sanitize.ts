/**
 * Display text sanitization
 *
 * Flow, page and route group names come from exported documents and are
 * untrusted. Everything a reporter prints passes through here first.
 */

/** CSI and OSC escape sequences */
// eslint-disable-next-line no-control-regex
const ANSI_ESCAPE_REGEX = /\u001b\[[0-9;?]*[ -/]*[@-~]|\u001b\][^\u0007\u001b]*(?:\u0007|\u001b\\)/g;

// eslint-disable-next-line no-control-regex
const LINE_BREAK_REGEX = /[\r\n\t]+/g;

// eslint-disable-next-line no-control-regex
const CONTROL_CHAR_REGEX = /[\u0000-\u001f\u007f-\u009f]/g;

/**
 * Strip terminal escape sequences and control characters; line breaks and
 * tabs collapse to a single space
 */
export function sanitizeDisplayText(text: string): string {
  return text
    .replace(ANSI_ESCAPE_REGEX, '')
    .replace(LINE_BREAK_REGEX, ' ')
    .replace(CONTROL_CHAR_REGEX, '');
}
