/**
 * Block-level agreement with the `marked` lexer on the supported subset.
 */
import { Lexer, type Token as MarkedToken, type Tokens } from 'marked';
import { parseMarkdown } from '../../src/core/parser';
import type { BlockToken } from '../../src/core/types';

function describeOurs(block: BlockToken): string {
  switch (block.type) {
    case 'heading':
      return `heading:${block.level}`;
    case 'paragraph':
      return 'paragraph';
    case 'code-block':
      return `code:${block.language ?? ''}:${block.content.replace(/\n$/, '')}`;
    case 'list':
      return `list:${block.ordered}:${block.items.length}`;
    case 'block-quote':
      return 'block-quote';
    case 'rule':
      return 'rule';
  }
}

function describeMarked(token: MarkedToken): string {
  switch (token.type) {
    case 'heading':
      return `heading:${(token as Tokens.Heading).depth}`;
    case 'paragraph':
      return 'paragraph';
    case 'code': {
      const code = token as Tokens.Code;
      return `code:${code.lang ?? ''}:${code.text}`;
    }
    case 'list': {
      const list = token as Tokens.List;
      return `list:${list.ordered}:${list.items.length}`;
    }
    case 'blockquote':
      return 'block-quote';
    case 'hr':
      return 'rule';
    default:
      return token.type;
  }
}

describe('Conformance - block structure matches marked', () => {
  it.each([
    '# Title',
    '###### six',
    '## Sub\n\ntext',
    '```js\nconst a = 1;\n```',
    '- a\n- b\n- c',
    '1. x\n2. y',
    '> quoted',
    'para\n\n---\n\nmore',
    '# Intro\n\nSome *text*.\n\n```py\nprint(1)\n```\n\n- one\n- two',
  ])('%p', (md) => {
    const ours = parseMarkdown(md).document.children.map(describeOurs);
    const theirs = Lexer.lex(md)
      .filter((t) => t.type !== 'space')
      .map(describeMarked);
    expect(ours).toEqual(theirs);
  });
});
