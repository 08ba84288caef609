import { clipText, collapseWhitespace, tokenize } from '../../src/utils/text.js';

describe('text utilities', () => {
  test('tokenize lowercases and splits on non-alphanumerics', () => {
    expect(tokenize('Hello, World! 42x')).toEqual(['hello', 'world', '42x']);
    expect(tokenize(null)).toEqual([]);
    expect(tokenize('')).toEqual([]);
  });

  test('collapseWhitespace', () => {
    expect(collapseWhitespace('  a \n\t b  ')).toBe('a b');
  });

  test('clipText leaves short text alone after normalizing', () => {
    expect(clipText('a  b\n c', 10)).toBe('a b c');
  });

  test('clipText prefers a word boundary', () => {
    expect(clipText('the quick brown fox jumps', 15)).toBe('the quick...');
  });

  test('clipText cuts mid-word when no boundary is close enough', () => {
    expect(clipText('abcdefghijklmnop', 8)).toBe('abcde...');
  });

  test('clipText with a tiny limit skips the marker', () => {
    expect(clipText('abcdefghij', 3)).toBe('abc');
  });
});
