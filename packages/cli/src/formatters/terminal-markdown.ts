import { marked } from 'marked';
import { markedTerminal } from 'marked-terminal';

marked.use(markedTerminal());

/** Renders markdown with terminal styling; falls back to the source text. */
export function renderMarkdown(text: string): string {
  const output = marked.parse(text);
  // marked-terminal adds a trailing newline; trim for clean layout
  return typeof output === 'string' ? output.trimEnd() : text;
}
