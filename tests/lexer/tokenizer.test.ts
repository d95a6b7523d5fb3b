/**
 * Decla Lexer Tests: Tokenizer
 */

import { describe, expect, it } from 'vitest';
import { Diagnostics } from '../../src/diagnostics.js';
import {
  classify,
  createLexerState,
  formatToken,
  nextToken,
  tokenize,
} from '../../src/lexer/index.js';
import { INT64_MAX } from '../../src/values.js';

function types(source: string): string[] {
  return tokenize(source).map((t) => t.type);
}

describe('Decla Lexer', () => {
  describe('declarations', () => {
    it('scans a full declaration', () => {
      const tokens = tokenize('let x: int = 42;');
      expect(
        tokens.map((t) => [t.type, t.lexeme, t.span.start.column])
      ).toEqual([
        ['LET', 'let', 1],
        ['IDENTIFIER', 'x', 5],
        ['COLON', ':', 6],
        ['TYPE_INT', 'int', 8],
        ['EQUAL', '=', 12],
        ['INT', '42', 14],
        ['SEMICOLON', ';', 16],
        ['EOF', '', 17],
      ]);
    });

    it('records start and end locations with offsets', () => {
      const [, name] = tokenize('let abc');
      expect(name?.span).toEqual({
        start: { line: 1, column: 5, offset: 4 },
        end: { line: 1, column: 8, offset: 7 },
      });
    });

    it('recognizes every keyword', () => {
      expect(types('let true false null int float bool string')).toEqual([
        'LET',
        'TRUE',
        'FALSE',
        'NULL',
        'TYPE_INT',
        'TYPE_FLOAT',
        'TYPE_BOOL',
        'TYPE_STRING',
        'EOF',
      ]);
    });

    it('matches keywords exactly', () => {
      expect(types('Let letter int2 _null')).toEqual([
        'IDENTIFIER',
        'IDENTIFIER',
        'IDENTIFIER',
        'IDENTIFIER',
        'EOF',
      ]);
    });

    it('accepts underscores and digits in identifiers', () => {
      const [token] = tokenize('_tmp_2');
      expect(token?.type).toBe('IDENTIFIER');
      expect(token?.lexeme).toBe('_tmp_2');
    });
  });

  describe('whitespace and lines', () => {
    it('skips space, tab, vertical tab, form feed and carriage return', () => {
      const [token] = tokenize('\t\v\f\r let');
      expect(token?.type).toBe('LET');
      expect(token?.span.start.column).toBe(6);
    });

    it('resets the column and increments the line on newline', () => {
      const [first, second] = tokenize('let\n  x');
      expect(first?.span.start).toEqual({ line: 1, column: 1, offset: 0 });
      expect(second?.span.start).toEqual({ line: 2, column: 3, offset: 6 });
    });

    it('keeps returning EOF at end of input', () => {
      const state = createLexerState('', new Diagnostics());
      expect(nextToken(state).type).toBe('EOF');
      expect(nextToken(state).type).toBe('EOF');
    });
  });

  describe('numbers', () => {
    it('scans an int with its payload', () => {
      const [token] = tokenize('42');
      expect(token?.type).toBe('INT');
      expect(token?.literal).toEqual({ type: 'int', value: 42n });
    });

    it('drops leading zeros from the payload but not the lexeme', () => {
      const [token] = tokenize('007');
      expect(token?.lexeme).toBe('007');
      expect(token?.literal).toEqual({ type: 'int', value: 7n });
    });

    it('scans a float when a digit follows the dot', () => {
      const [token] = tokenize('3.25');
      expect(token?.type).toBe('FLOAT');
      expect(token?.literal).toEqual({ type: 'float', value: 3.25 });
    });

    it('stops an int before a dot with no digit after it', () => {
      const diagnostics = new Diagnostics();
      const tokens = tokenize('1.', diagnostics);
      expect(tokens.map((t) => t.type)).toEqual(['INT', 'ERROR']);
      expect(diagnostics.current?.message).toBe("Unexpected character: '.'");
    });

    it('saturates ints above the signed 64-bit maximum', () => {
      const [token] = tokenize('99999999999999999999');
      expect(token?.literal).toEqual({ type: 'int', value: INT64_MAX });
    });

    it('keeps the signed 64-bit maximum itself', () => {
      const [token] = tokenize('9223372036854775807');
      expect(token?.literal).toEqual({
        type: 'int',
        value: 9223372036854775807n,
      });
    });
  });

  describe('strings', () => {
    it('scans a string with verbatim content', () => {
      const [token] = tokenize('"a\\nb"');
      expect(token?.type).toBe('STRING');
      expect(token?.lexeme).toBe('"a\\nb"');
      expect(token?.literal).toEqual({ type: 'string', value: 'a\\nb' });
    });

    it('scans the empty string', () => {
      const [token] = tokenize('""');
      expect(token?.literal).toEqual({ type: 'string', value: '' });
    });

    it('counts newlines inside strings', () => {
      const tokens = tokenize('"a\nb";');
      expect(tokens[0]?.literal).toEqual({ type: 'string', value: 'a\nb' });
      expect(tokens[0]?.span.end).toEqual({ line: 2, column: 3, offset: 5 });
      expect(tokens[1]?.span.start).toEqual({ line: 2, column: 3, offset: 5 });
    });

    it('reports an unterminated string from the opening quote', () => {
      const diagnostics = new Diagnostics();
      const tokens = tokenize('let s: string = "abc', diagnostics);
      const last = tokens[tokens.length - 1];
      expect(last?.type).toBe('ERROR');
      expect(last?.lexeme).toBe('"abc');
      expect(diagnostics.current).toEqual({
        kind: 'syntax',
        line: 1,
        column: 17,
        message: 'Unterminated string.',
        sourceLine: 'let s: string = "abc',
        position: 16,
        length: 4,
      });
    });
  });

  describe('errors', () => {
    it('reports an unexpected character', () => {
      const diagnostics = new Diagnostics();
      const tokens = tokenize('x @', diagnostics);
      expect(tokens.map((t) => t.type)).toEqual(['IDENTIFIER', 'ERROR']);
      expect(diagnostics.current).toMatchObject({
        kind: 'syntax',
        line: 1,
        column: 3,
        message: "Unexpected character: '@'",
        position: 2,
        length: 1,
      });
    });

    it('reports a non-ASCII character as one code point', () => {
      const diagnostics = new Diagnostics();
      const [token] = tokenize('\u{1F600}', diagnostics);
      expect(token?.lexeme).toBe('\u{1F600}');
      expect(diagnostics.current?.message).toBe(
        "Unexpected character: '\u{1F600}'"
      );
    });

    it('stops scanning at the first error token', () => {
      expect(types('@ let')).toEqual(['ERROR']);
    });
  });

  describe('classify', () => {
    it('classifies each character class', () => {
      expect(classify(' ')).toBe('whitespace');
      expect(classify('a')).toBe('alpha');
      expect(classify('Z')).toBe('alpha');
      expect(classify('_')).toBe('alpha');
      expect(classify('7')).toBe('digit');
      expect(classify('"')).toBe('quote');
      expect(classify('\n')).toBe('newline');
      expect(classify('')).toBe('end');
      expect(classify('@')).toBe('other');
      expect(classify('é')).toBe('other');
    });
  });

  describe('formatToken', () => {
    it('renders type, location and lexeme', () => {
      const int = tokenize('let x: int = 42;')[5];
      expect(int && formatToken(int)).toBe(
        "Token: INT, Line: 1, Column: 14, Lexeme: '42'"
      );
    });
  });
});
