import MarkdownIt from 'markdown-it';
import type { Configuration } from './config';
import { markedPassagePlugin } from './preview/marked-passage-plugin';

/** Create a MarkdownIt instance with the marked-passage plugin and render input. */
export function renderWithPlugin(input: string, configuration?: Configuration | (() => Configuration)): string {
  const md = new MarkdownIt();
  md.use(markedPassagePlugin, { configuration });
  return md.render(input);
}

/** Expected HTML for one rendered passage, delimiters escaped the way markdown-it does. */
export function passageHtml(left: string, innerHtml: string, right: string): string {
  return '<mark class="marked-passage">'
    + `<span class="marked-passage-delimiter">${escapeHtml(left)}</span>`
    + innerHtml
    + `<span class="marked-passage-delimiter">${escapeHtml(right)}</span>`
    + '</mark>';
}

/** Escape HTML entities the same way markdown-it does. */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
