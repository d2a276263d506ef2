import { preprocessMarkdown } from '../../src/core/preprocessor';

describe('preprocessMarkdown', () => {
  describe('normalizeLineEndings', () => {
    it('should convert CRLF and lone CR to LF', () => {
      expect(preprocessMarkdown('a\r\nb\rc')).toBe('a\nb\nc');
    });

    it('should drop a leading byte-order mark', () => {
      expect(preprocessMarkdown('\uFEFF# Title')).toBe('# Title');
    });

    it('should normalize line endings inside code blocks too', () => {
      expect(preprocessMarkdown('```\r\ncode\r\n```')).toBe('```\ncode\n```');
    });
  });

  describe('stripHtmlComments', () => {
    it('should remove inline comments', () => {
      expect(preprocessMarkdown('a <!-- hidden --> b')).toBe('a  b');
    });

    it('should remove comments spanning lines', () => {
      expect(preprocessMarkdown('a\n<!--\nnote\n-->\nb')).toBe('a\n\nb');
    });

    it('should keep comments inside fenced code', () => {
      const input = '```html\n<!-- keep -->\n```';
      expect(preprocessMarkdown(input)).toBe(input);
    });

    it('should keep comments inside inline code', () => {
      const input = 'use `<!-- x -->` here';
      expect(preprocessMarkdown(input)).toBe(input);
    });

    it('should keep a shorter fence inside a longer one verbatim', () => {
      const fenced = '````md\n```js\nx\n\n\n\n<!-- keep -->\n```\n````';
      expect(preprocessMarkdown(`${fenced}\nafter\n\n\n\nend`)).toBe(`${fenced}\nafter\n\nend`);
    });

    it('should not end a fence at backticks inside a code line', () => {
      const input = '```\nconst s = "```";\n<!-- keep -->\n\n\n\n```';
      expect(preprocessMarkdown(input)).toBe(input);
    });

    it('should protect an unterminated fence', () => {
      const input = '```\n<!-- keep -->\n\n\n\nend';
      expect(preprocessMarkdown(input)).toBe(input);
    });
  });

  describe('normalizeBlankLines', () => {
    it('should reduce 3+ consecutive blank lines to 2', () => {
      expect(preprocessMarkdown('line1\n\n\n\nline2')).toBe('line1\n\nline2');
    });

    it('should preserve exactly 2 blank lines', () => {
      expect(preprocessMarkdown('line1\n\nline2')).toBe('line1\n\nline2');
    });

    it('should handle multiple groups of blank lines', () => {
      expect(preprocessMarkdown('a\n\n\n\nb\n\n\n\n\nc')).toBe('a\n\nb\n\nc');
    });

    it('should not touch blank lines inside code blocks', () => {
      const input = '```\na\n\n\n\nb\n```';
      expect(preprocessMarkdown(input)).toBe(input);
    });
  });

  describe('convertCheckboxes', () => {
    it('should convert checked and unchecked boxes', () => {
      expect(preprocessMarkdown('- [x] done\n- [ ] todo')).toBe('- ☑ done\n- ☐ todo');
    });

    it('should accept an uppercase X', () => {
      expect(preprocessMarkdown('* [X] Done')).toBe('* ☑ Done');
    });

    it('should leave list items that start with a link alone', () => {
      const input = '- [x](https://example.com)\n- [ ](https://example.org)';
      expect(preprocessMarkdown(input)).toBe(input);
    });

    it('should leave brackets outside list items alone', () => {
      expect(preprocessMarkdown('see [x] here')).toBe('see [x] here');
    });
  });
});
