import { describe, test, expect } from 'vitest';
import { isAllowed, parseAllowList } from '../src/access.js';

describe('parseAllowList', () => {
  test('keeps numeric entries and drops the rest', () => {
    expect([...parseAllowList('1, 2, abc, 3')]).toEqual(['1', '2', '3']);
  });

  test('empty or missing input yields an empty set', () => {
    expect(parseAllowList('').size).toBe(0);
    expect(parseAllowList(undefined).size).toBe(0);
  });

  test('drops signed, fractional and hex entries', () => {
    expect([...parseAllowList(' 42 ,, -7, 1.5, 0x10, 123456789012345678')]).toEqual([
      '42',
      '123456789012345678',
    ]);
  });

  test('collapses duplicates', () => {
    expect(parseAllowList('5,5, 5').size).toBe(1);
  });
});

describe('isAllowed', () => {
  test('generative mode with an empty list allows everyone', () => {
    expect(isAllowed('99', new Set(), 'generative')).toBe(true);
  });

  test('generative mode with a list allows members only', () => {
    const list = new Set(['42']);
    expect(isAllowed('42', list, 'generative')).toBe(true);
    expect(isAllowed('7', list, 'generative')).toBe(false);
  });

  test('static mode with an empty list allows nobody', () => {
    expect(isAllowed('99', new Set(), 'static')).toBe(false);
  });

  test('static mode allows members only', () => {
    const list = new Set(['42']);
    expect(isAllowed('42', list, 'static')).toBe(true);
    expect(isAllowed('7', list, 'static')).toBe(false);
  });
});
