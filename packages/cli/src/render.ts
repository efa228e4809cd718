import type { CLIErrorView } from '@fieldwarden/core';

const ESC = '\u001B[';
const STYLE = {
  title: [`${ESC}31m`, `${ESC}1m`],
  muted: [`${ESC}2m`],
} as const;
const RESET = `${ESC}0m`;

function paint(
  text: string,
  codes: readonly string[],
  enabled: boolean
): string {
  return enabled ? `${codes.join('')}${text}${RESET}` : text;
}

/**
 * Greedy word wrap; continuation lines get `indent` so a violation stays
 * visually grouped under its bullet
 */
function wrap(text: string, width: number, indent = ''): string[] {
  const out: string[] = [];
  let current = '';
  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (current === '') {
      current = word;
      continue;
    }
    const candidate = `${current} ${word}`;
    if (candidate.length <= width) {
      current = candidate;
      continue;
    }
    out.push(current);
    current = `${indent}${word}`;
  }
  if (current !== '') out.push(current);
  return out;
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth > 0 ? view.terminalWidth : 80;
  const lines: string[] = [paint(`❌ ${view.title}`, STYLE.title, view.colors)];

  if (view.location) {
    lines.push(...wrap(`📍 ${view.location}`, width));
  }
  for (const field of view.fields) {
    lines.push(...wrap(`• ${field}`, width, '  '));
  }
  if (view.truncated) {
    lines.push(
      paint('… further violations were not reported', STYLE.muted, view.colors)
    );
  }

  return lines.join('\n');
}

const ANSI_PATTERN =
  /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g; // eslint-disable-line no-control-regex

export function stripAnsi(input: string): string {
  return input.replace(ANSI_PATTERN, '');
}

export default renderCLIView;
