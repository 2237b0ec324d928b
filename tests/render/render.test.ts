/**
 * Tests for search result rendering
 */

import { describe, it, expect } from 'vitest';
import { renderSearchResults, getTemplates } from '../../src/render/index.js';
import type { BookRecord } from '../../src/types/index.js';

const MARS: BookRecord = {
  title: '火星での園芸入門',
  author: '火星の園芸家',
  year: 2250,
  description: '火星の特殊な環境で植物を育てる方法を解説。',
  isbn: '978-0-123456-47-13',
};

const ROBOT: BookRecord = {
  title: 'Robot Gardening',
  author: 'R. Daneel',
  year: 4100,
  description: 'Pruning with positronic precision',
  isbn: 'test-isbn-1',
};

describe('renderSearchResults', () => {
  describe('ja templates', () => {
    const templates = getTemplates('ja');

    it('should render only the no-results line for an empty match set', () => {
      expect(renderSearchResults('xyz', [], templates)).toBe(
        "キーワード 'xyz' に一致する本が見つかりませんでした。"
      );
    });

    it('should render a header and one block per match', () => {
      const text = renderSearchResults('火星', [MARS], templates);

      expect(text).toBe(
        "キーワード '火星' の検索結果:\n\n" +
          'タイトル: 火星での園芸入門\n' +
          '著者: 火星の園芸家\n' +
          '出版年: 2250\n' +
          'ISBN: 978-0-123456-47-13\n' +
          '説明: 火星の特殊な環境で植物を育てる方法を解説。\n\n'
      );
    });

    it('should separate blocks with a blank line in match order', () => {
      const text = renderSearchResults('', [ROBOT, MARS], templates);
      const blocks = text.split('\n\n');

      // header, two blocks, then the empty tail after the final blank line
      expect(blocks).toHaveLength(4);
      expect(blocks[1]?.startsWith('タイトル: Robot Gardening\n')).toBe(true);
      expect(blocks[2]?.startsWith('タイトル: 火星での園芸入門\n')).toBe(true);
      expect(blocks[3]).toBe('');
    });
  });

  describe('en templates', () => {
    const templates = getTemplates('en');

    it('should render English labels', () => {
      expect(renderSearchResults('robot', [ROBOT], templates)).toBe(
        "Search results for keyword 'robot':\n\n" +
          'Title: Robot Gardening\n' +
          'Author: R. Daneel\n' +
          'Year: 4100\n' +
          'ISBN: test-isbn-1\n' +
          'Description: Pruning with positronic precision\n\n'
      );
    });

    it('should render the English no-results line', () => {
      expect(renderSearchResults('none', [], templates)).toBe(
        "No books found matching keyword 'none'."
      );
    });
  });

  it('should not escape or trim the keyword', () => {
    const text = renderSearchResults(" <b>'q'</b> ", [], getTemplates('en'));

    expect(text).toBe("No books found matching keyword ' <b>'q'</b> '.");
  });
});
