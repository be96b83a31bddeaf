import type { CLIErrorView } from '@schemaweave/core';

const ESC = '\u001B[';
const STYLES = {
  reset: `${ESC}0m`,
  bold: `${ESC}1m`,
  dim: `${ESC}2m`,
  red: `${ESC}31m`,
} as const;

type Style = Exclude<keyof typeof STYLES, 'reset'>;

function paint(text: string, enabled: boolean, styles: Style[]): string {
  if (!enabled || styles.length === 0) return text;
  return `${styles.map((style) => STYLES[style]).join('')}${text}${STYLES.reset}`;
}

/** Greedy word wrap; continuation lines start with `indent`. */
export function wrapText(text: string, width: number, indent = ''): string[] {
  const lines: string[] = [];
  let line = '';
  for (const word of text.split(/\s+/).filter((w) => w !== '')) {
    const candidate = line ? `${line} ${word}` : word;
    if (line && candidate.length > width) {
      lines.push(line);
      line = `${indent}${word}`;
    } else {
      line = candidate;
    }
  }
  if (line) lines.push(line);
  return lines;
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const out = [paint(`❌ ${view.title}`, view.colors, ['bold', 'red'])];

  const section = (text: string | undefined, styles: Style[] = []): void => {
    if (!text) return;
    for (const line of wrapText(text, width, '   ')) {
      out.push(paint(line, view.colors, styles));
    }
  };
  section(view.location && `📍 ${view.location}`);
  section(view.cause && `Caused by: ${view.cause}`, ['dim']);
  section(view.workaround && `💡 Workaround: ${view.workaround}`);

  return out.join('\n');
}

export function stripAnsi(input: string): string {
  return input.replace(/\u001B\[[0-9;]*m/g, ''); // eslint-disable-line no-control-regex
}
