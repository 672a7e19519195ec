import { sliceHead, sliceTail } from '@shared/lib/text.js';

export const ELISION_MARKER = '\n[... log truncated ...]\n';
export const DEFAULT_HEAD_LENGTH = 1000;

export interface NormalizeOptions {
  /** Leading characters kept on truncation (command invocation context). */
  headLength?: number;
}

const ESC = String.fromCharCode(0x1b);
const BEL = String.fromCharCode(0x07);
// CSI sequences (colors, cursor moves) and OSC sequences (titles, links).
const ANSI_CSI_RE = new RegExp(`${ESC}\\[[0-?]*[ -/]*[@-~]`, 'g');
const ANSI_OSC_RE = new RegExp(`${ESC}\\][^${BEL}${ESC}]*(?:${BEL}|${ESC}\\\\)`, 'g');
const ANSI_LONE_ESC_RE = new RegExp(`${ESC}[@-Z\\\\-_]`, 'g');

/** GitHub Actions line prefix, e.g. `2025-01-01T06:33:34.9138563Z `. */
const TIMESTAMP_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?Z ?/;
const GROUP_PREFIX_RE = /^##\[group\]/;
const ENDGROUP_LINE = '##[endgroup]';

function cleanLines(text: string): string {
  const lines: string[] = [];
  for (const rawLine of text.split('\n')) {
    const line = rawLine.replace(TIMESTAMP_RE, '').replace(GROUP_PREFIX_RE, '').trimEnd();
    if (line.trim() === ENDGROUP_LINE) continue;
    lines.push(line);
  }
  return lines.join('\n');
}

/**
 * Turn a raw build log into a bounded excerpt for the reasoning service.
 *
 * Line endings become LF, terminal escape sequences and per-line timestamps
 * are removed, group-end markers are dropped, runs of blank lines collapse to
 * one and the whole excerpt is trimmed.
 *
 * When the excerpt is longer than `maxLength` it keeps the first `headLength`
 * characters and as much of the end as fits, joined by `ELISION_MARKER`, so
 * the result is `maxLength` long. A cut that would split a surrogate pair moves
 * inward by one unit. If there is no room for the head and the marker, only
 * the end is kept.
 */
export function normalize(rawLog: string, maxLength: number, options: NormalizeOptions = {}): string {
  if (maxLength <= 0) return '';

  const cleaned = cleanLines(
    rawLog
      .replace(/\r\n?/g, '\n')
      .replace(ANSI_OSC_RE, '')
      .replace(ANSI_CSI_RE, '')
      .replace(ANSI_LONE_ESC_RE, ''),
  )
    .replace(/\n{3,}/g, '\n\n')
    .trim();

  if (cleaned.length <= maxLength) return cleaned;

  const headLength = Math.max(0, options.headLength ?? DEFAULT_HEAD_LENGTH);
  const tailLength = maxLength - headLength - ELISION_MARKER.length;
  if (headLength === 0 || tailLength <= 0) {
    return sliceTail(cleaned, maxLength);
  }
  return sliceHead(cleaned, headLength) + ELISION_MARKER + sliceTail(cleaned, tailLength);
}
