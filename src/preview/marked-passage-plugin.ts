import type MarkdownIt from 'markdown-it';
import { DEFAULT_CONFIGURATION, type Configuration } from '../config';
import { compileConfiguration, GROUP_INNER, GROUP_LEFT, GROUP_RIGHT } from '../pattern';

type InlineRule = Parameters<MarkdownIt['inline']['ruler']['before']>[2];
type StateInline = Parameters<InlineRule>[0];
type Token = StateInline['tokens'][number];

export const PASSAGE_CLASS = 'marked-passage';
export const DELIMITER_CLASS = 'marked-passage-delimiter';

export interface MarkedPassagePluginOptions {
  /** Fixed delimiters, or a getter read on every render */
  configuration?: Configuration | (() => Configuration);
}

/**
 * Helper function to add parsed inline content tokens to the state
 * @param state - The inline parsing state
 * @param content - The content to parse
 */
function addInlineContent(state: StateInline, content: string): void {
  if (content.length === 0) {
    return;
  }

  const childTokens: Token[] = [];
  state.md.inline.parse(content, state.md, state.env, childTokens);

  for (const childToken of childTokens) {
    const token = state.push(childToken.type, childToken.tag, childToken.nesting);
    token.content = childToken.content;
    token.markup = childToken.markup;
    if (childToken.attrs) {
      for (const [key, value] of childToken.attrs) {
        token.attrSet(key, value);
      }
    }
    if (childToken.children) {
      token.children = childToken.children;
    }
  }
}

function pushDelimiter(state: StateInline, delimiter: string): void {
  const token = state.push('marked_passage_delimiter', 'span', 0);
  token.content = delimiter;
  token.markup = delimiter;
}

/**
 * Inline rule that turns `L inner R` into a passage token sequence.
 *
 * markdown-it's text rule only stops at terminator characters, so a passage
 * is recognised mid-text only when its left delimiter starts with one
 * (`<`, `[`, `{`, `=`, `@` and similar).
 */
function passageRule(getConfiguration: () => Configuration): InlineRule {
  return (state, silent) => {
    const config = getConfiguration();
    const start = state.pos;
    if (!state.src.startsWith(config.delimiterLeft, start)) {
      return false;
    }

    const re = new RegExp(compileConfiguration(config).source, 'y');
    re.lastIndex = start;
    const match = re.exec(state.src);
    if (!match || re.lastIndex > state.posMax) {
      return false;
    }

    if (!silent) {
      const open = state.push('marked_passage_open', 'mark', 1);
      open.attrSet('class', PASSAGE_CLASS);
      pushDelimiter(state, match[GROUP_LEFT]);
      addInlineContent(state, match[GROUP_INNER]);
      pushDelimiter(state, match[GROUP_RIGHT]);
      state.push('marked_passage_close', 'mark', -1);
    }
    state.pos = re.lastIndex;
    return true;
  };
}

/**
 * Registers marked-passage highlighting with markdown-it
 * @param md - The MarkdownIt instance to extend
 */
export function markedPassagePlugin(md: MarkdownIt, options: MarkedPassagePluginOptions = {}): void {
  const configured = options.configuration ?? DEFAULT_CONFIGURATION;
  const getConfiguration = typeof configured === 'function' ? configured : () => configured;

  // Run before emphasis so autolink and html_inline never see the delimiters
  md.inline.ruler.before('emphasis', 'marked_passage', passageRule(getConfiguration));

  md.renderer.rules['marked_passage_open'] = (tokens, idx) => {
    const className = tokens[idx].attrGet('class') ?? PASSAGE_CLASS;
    return `<mark class="${className}">`;
  };
  md.renderer.rules['marked_passage_close'] = () => '</mark>';
  md.renderer.rules['marked_passage_delimiter'] = (tokens, idx) =>
    `<span class="${DELIMITER_CLASS}">${md.utils.escapeHtml(tokens[idx].content)}</span>`;
}
