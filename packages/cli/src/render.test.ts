import { describe, it, expect } from 'vitest';
import { renderCLIView, stripAnsi } from './render.js';
import type { CLIErrorView } from '@fieldwarden/core';
import { ErrorCode } from '@fieldwarden/core';

function view(overrides: Partial<CLIErrorView> = {}): CLIErrorView {
  return {
    title: 'Error E200: validation failed with 2 violations',
    code: ErrorCode.VALIDATION_FAILED,
    fields: [
      'email: must be a valid email address [tag.email]',
      'age: must be 18 or greater [tag.min]',
    ],
    truncated: false,
    colors: false,
    terminalWidth: 80,
    ...overrides,
  };
}

describe('renderCLIView', () => {
  it('renders the title and one line per violation', () => {
    expect(renderCLIView(view())).toBe(
      [
        '❌ Error E200: validation failed with 2 violations',
        '• email: must be a valid email address [tag.email]',
        '• age: must be 18 or greater [tag.min]',
      ].join('\n')
    );
  });

  it('renders the location and the truncation notice', () => {
    const out = renderCLIView(
      view({
        title: 'Error E200: validation failed with more than 1 violation',
        fields: ['a: is required [tag.required]'],
        location: 'Location: items.0',
        truncated: true,
      })
    );
    expect(out.split('\n')).toEqual([
      '❌ Error E200: validation failed with more than 1 violation',
      '📍 Location: items.0',
      '• a: is required [tag.required]',
      '… further violations were not reported',
    ]);
  });

  it('applies ANSI colors when enabled', () => {
    const out = renderCLIView(view({ colors: true }));
    expect(out.startsWith('\u001B[31m\u001B[1m❌')).toBe(true);
    expect(stripAnsi(out).split('\n')[0]).toBe(
      '❌ Error E200: validation failed with 2 violations'
    );
  });

  it('wraps long violations with a hanging indent', () => {
    const out = renderCLIView(
      view({ fields: ['name: is required [tag.required]'], terminalWidth: 20 })
    );
    expect(out.split('\n').slice(1)).toEqual([
      '• name: is required',
      '  [tag.required]',
    ]);
  });
});
