/**
 * Integration tests for edge cases that span the full pipeline
 * (preprocessor -> scanner -> parser -> renderer -> postprocessor).
 */
import { preprocessMarkdown } from '../../src/core/preprocessor';
import { parseMarkdown, walkTokens } from '../../src/core/parser';
import { buildDocument } from '../../src/core/renderer';
import { postprocessElements } from '../../src/core/postprocessor';
import type { LinkElement, StyledElement, TextRunElement } from '../../src/core/types';

function fullPipeline(markdown: string): StyledElement[] {
  const preprocessed = preprocessMarkdown(markdown);
  const { document } = parseMarkdown(preprocessed);
  return postprocessElements(buildDocument(document, {}));
}

function texts(elements: StyledElement[]): TextRunElement[] {
  return elements.filter((e): e is TextRunElement => e.type === 'text');
}

describe('Edge cases - full pipeline', () => {
  describe('code blocks with markdown syntax', () => {
    it('should not interpret markdown inside fenced code blocks', () => {
      const elements = fullPipeline('```\n# Not a heading\n**not bold**\n```');
      expect(elements.map((e) => e.type)).toEqual(['break', 'code-block', 'break']);
      expect(elements[1]).toMatchObject({ content: '# Not a heading\n**not bold**\n' });
    });

    it('should preserve code block content exactly', () => {
      const elements = fullPipeline('```javascript\nconst x = `template ${literal}`;\n```');
      expect(elements[1]).toMatchObject({
        type: 'code-block',
        language: 'javascript',
        content: 'const x = `template ${literal}`;\n',
      });
    });
  });

  describe('nested fences', () => {
    it('should keep an inner fence, blank lines and comments verbatim', () => {
      const elements = fullPipeline('````md\n```js\nx\n\n\n\n<!-- keep -->\n```\n````\n');
      expect(elements.map((e) => e.type)).toEqual(['break', 'code-block', 'break']);
      expect(elements[1]).toMatchObject({
        type: 'code-block',
        language: 'md',
        content: '```js\nx\n\n\n\n<!-- keep -->\n```\n',
      });
    });
  });

  describe('degradation', () => {
    it.each([
      '**unclosed bold',
      '*a **b*',
      '[broken](',
      '[empty]()',
      '![no close](x.png',
      '_under_score_',
      '``` ',
      '> > nested quote marker',
      '***',
      '1.no space',
    ])('should not throw for %p', (md) => {
      expect(() => fullPipeline(md)).not.toThrow();
    });

    it('should keep the characters of a broken link', () => {
      const [run] = texts(fullPipeline('see [docs](http://x'));
      expect(run.content).toBe('see [docs](http://x');
    });

    it('should keep unmatched emphasis markers as text', () => {
      const [run] = texts(fullPipeline('2 * 3 = 6'));
      expect(run.content).toBe('2 * 3 = 6');
    });
  });

  describe('deep nesting', () => {
    it('should build a thousand nested emphasis spans', () => {
      const markers = Array.from({ length: 1000 }, (_, i) => (i % 2 === 0 ? '*' : '_'));
      const open = markers.map((m) => `${m}x`).join(' ');
      const close = [...markers]
        .reverse()
        .map((m) => `x${m}`)
        .join(' ');
      const { document } = parseMarkdown(`${open} a ${close}`);

      let spans = 0;
      walkTokens(document, (token) => {
        if (token.type === 'emphasis') spans++;
      });
      expect(spans).toBe(1000);

      const innermost = texts(buildDocument(document, {})).find((e) => e.content === 'x a x');
      expect(innermost?.style.bold).toBe(true);
      expect(innermost?.style.italic).toBe(true);
    });

    it('should nest lists hundreds of levels deep', () => {
      const depth = 300;
      const md = Array.from({ length: depth }, (_, i) => `${'  '.repeat(i)}- item${i}`).join('\n');
      const elements = fullPipeline(md);
      const starts = elements.filter((e) => e.type === 'item-start');
      expect(starts).toHaveLength(depth);
      expect(starts[depth - 1]).toMatchObject({ depth });
    });
  });

  describe('links', () => {
    it('should keep text and url paired for every well-formed link', () => {
      const md = '- [one](https://a.test)\n- **[two](https://b.test)**\n\n> [three *x*](https://c.test)';
      const links = fullPipeline(md).filter((e): e is LinkElement => e.type === 'link');
      expect(links.map((l) => [l.text, l.url])).toEqual([
        ['one', 'https://a.test'],
        ['two', 'https://b.test'],
        ['three x', 'https://c.test'],
      ]);
    });
  });

  describe('task lists', () => {
    it('should render checkboxes as ballot boxes', () => {
      const runs = texts(fullPipeline('- [x] done\n- [ ] open'));
      expect(runs.map((r) => r.content)).toEqual(['☑ done', '☐ open']);
    });

    it('should keep a link labelled x at the start of an item', () => {
      const elements = fullPipeline('- [x](https://example.com)');
      const links = elements.filter((e): e is LinkElement => e.type === 'link');
      expect(links.map((l) => [l.text, l.url])).toEqual([['x', 'https://example.com']]);
      expect(texts(elements)).toEqual([]);
    });
  });

  describe('html comments', () => {
    it('should drop comments before scanning', () => {
      const runs = texts(fullPipeline('before<!-- *hidden* -->after'));
      expect(runs.map((r) => r.content)).toEqual(['beforeafter']);
    });
  });
});
