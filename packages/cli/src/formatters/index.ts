import type { FormatName, OutputFormatter } from './formatter.js';
import { JsonFormatter } from './json.js';
import { MarkdownFormatter } from './markdown.js';
import { PlainFormatter } from './plain.js';

export function createFormatter(format: FormatName): OutputFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'md':
      return new MarkdownFormatter();
    case 'plain':
      return new PlainFormatter();
  }
}
