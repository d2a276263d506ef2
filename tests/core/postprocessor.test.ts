import { mergeAdjacentRuns, postprocessElements } from '../../src/core/postprocessor';
import { BASE_STYLE, mergeStyle } from '../../src/core/styles';
import type { StyledElement } from '../../src/core/types';

const plain = mergeStyle(BASE_STYLE, {});
const bold = mergeStyle(BASE_STYLE, { bold: true });

describe('mergeAdjacentRuns', () => {
  it('should merge consecutive runs with equal styles', () => {
    const input: StyledElement[] = [
      { type: 'text', content: 'a', style: plain },
      { type: 'text', content: '*', style: mergeStyle(BASE_STYLE, {}) },
      { type: 'text', content: 'b', style: plain },
    ];
    expect(mergeAdjacentRuns(input)).toEqual([{ type: 'text', content: 'a*b', style: plain }]);
  });

  it('should keep runs with different styles apart', () => {
    const input: StyledElement[] = [
      { type: 'text', content: 'a', style: plain },
      { type: 'text', content: 'b', style: bold },
    ];
    expect(mergeAdjacentRuns(input)).toEqual(input);
  });

  it('should not merge across other elements', () => {
    const input: StyledElement[] = [
      { type: 'text', content: 'a', style: plain },
      { type: 'break', edge: 'after', block: 'paragraph', spacing: 1 },
      { type: 'break', edge: 'before', block: 'paragraph', spacing: 0 },
      { type: 'text', content: 'b', style: plain },
    ];
    expect(mergeAdjacentRuns(input)).toHaveLength(4);
  });

  it('should not modify its input', () => {
    const input: StyledElement[] = [
      { type: 'text', content: 'a', style: plain },
      { type: 'text', content: 'b', style: plain },
    ];
    mergeAdjacentRuns(input);
    expect(input).toHaveLength(2);
    expect(input[0]).toEqual({ type: 'text', content: 'a', style: plain });
  });
});

describe('postprocessElements', () => {
  it('should return an empty array for no elements', () => {
    expect(postprocessElements([])).toEqual([]);
  });
});
