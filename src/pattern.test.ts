import { describe, it, expect } from 'vitest';
import { compilePattern, compileConfiguration, escapeRegExp, GROUP_INNER, GROUP_LEFT, GROUP_RIGHT } from './pattern';
import { ConfigurationError } from './errors';
import { createConfiguration } from './config';

describe('compilePattern', () => {
  it('exposes left delimiter, inner text and right delimiter groups', () => {
    const match = compilePattern('<<', '>>').toRegExp().exec('see <<a claim>> here');
    expect(match).not.toBeNull();
    expect(match?.[0]).toBe('<<a claim>>');
    expect(match?.[GROUP_LEFT]).toBe('<<');
    expect(match?.[GROUP_INNER]).toBe('a claim');
    expect(match?.[GROUP_RIGHT]).toBe('>>');
    expect(match?.index).toBe(4);
  });

  it('builds the source from escaped delimiters', () => {
    expect(compilePattern('<<', '>>').source).toBe('(<<)([^>]*?)(>>)');
    expect(compilePattern('{{', '}}').source).toBe('(\\{\\{)([^\\}]*?)(\\}\\})');
  });

  it('treats regex metacharacters in delimiters literally', () => {
    const pattern = compilePattern('(*', '*)');
    const match = pattern.toRegExp().exec('x (*note*) y');
    expect(match?.[GROUP_INNER]).toBe('note');

    const dotted = compilePattern('..', '..');
    expect(dotted.toRegExp().exec('ab')).toBeNull();
    expect(dotted.toRegExp().exec('a..b..c')?.[GROUP_INNER]).toBe('b');
  });

  it('matches the shortest passage', () => {
    const re = compilePattern('[[', ']]').toRegExp();
    expect(re.exec('[[one]] and [[two]]')?.[0]).toBe('[[one]]');
  });

  it('excludes the first character of the right delimiter from inner text', () => {
    const re = compilePattern('<<', '>>').toRegExp();
    expect(re.exec('<<a > b>>')).toBeNull();
  });

  it('allows passages to span lines', () => {
    const match = compilePattern('<<', '>>').toRegExp().exec('<<first\nsecond>>');
    expect(match?.[GROUP_INNER]).toBe('first\nsecond');
  });

  it('allows empty inner text', () => {
    expect(compilePattern('<<', '>>').toRegExp().exec('<<>>')?.[GROUP_INNER]).toBe('');
  });

  it('returns a fresh RegExp on every call', () => {
    const pattern = compilePattern('<<', '>>');
    const first = pattern.toRegExp();
    first.exec('<<a>> <<b>>');
    expect(first.lastIndex).toBe(5);
    expect(pattern.toRegExp().lastIndex).toBe(0);
  });

  it('rejects empty delimiters', () => {
    expect(() => compilePattern('', '>>')).toThrow(ConfigurationError);
    expect(() => compilePattern('<<', '')).toThrow(ConfigurationError);
  });

  it('compiles a configuration', () => {
    const pattern = compileConfiguration(createConfiguration('@@', '@@'));
    expect(pattern.delimiterLeft).toBe('@@');
    expect(pattern.toRegExp().exec('@@x@@')?.[GROUP_INNER]).toBe('x');
  });
});

describe('escapeRegExp', () => {
  it('escapes every metacharacter', () => {
    const special = '.*+?^${}()|[]\\/-';
    expect(new RegExp(`^${escapeRegExp(special)}$`).test(special)).toBe(true);
  });
});
