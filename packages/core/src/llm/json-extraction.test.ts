import { describe, it, expect } from 'vitest';
import { isJsonObject, parseJsonObject } from './json-extraction.js';

describe('parseJsonObject', () => {
  it('should parse a clean object directly', () => {
    expect(parseJsonObject('{"is_valuable": true}')).toEqual({ is_valuable: true });
  });

  it('should read the object out of a fenced code block', () => {
    const input = '```json\n{"terms": [{"term": "SLA"}]}\n```';
    expect(parseJsonObject(input)).toEqual({ terms: [{ term: 'SLA' }] });
  });

  it('should move on to the next fenced block when one is not JSON', () => {
    const input = '```\nnot json\n```\n```json\n{"ok": true}\n```';
    expect(parseJsonObject(input)).toEqual({ ok: true });
  });

  it('should find an object that follows an explanation', () => {
    expect(parseJsonObject('Here are the insights:\n{"insights": []}')).toEqual({ insights: [] });
  });

  it('should ignore braces inside string values', () => {
    const input = 'Result: {"content": "wrap {name} in braces", "ok": true} trailing';
    expect(parseJsonObject(input)).toEqual({ content: 'wrap {name} in braces', ok: true });
  });

  it('should skip a malformed object and take the next one', () => {
    const input = 'Draft: {"terms": [} Final: {"terms": []}';
    expect(parseJsonObject(input)).toEqual({ terms: [] });
  });

  it('should return an empty object for unparseable content', () => {
    expect(parseJsonObject('{"instructions": [')).toEqual({});
    expect(parseJsonObject('I could not find anything.')).toEqual({});
  });

  it('should return an empty object when the JSON is not an object', () => {
    expect(parseJsonObject('[1, 2, 3]')).toEqual({});
    expect(parseJsonObject('"just a string"')).toEqual({});
    expect(parseJsonObject('null')).toEqual({});
  });
});

describe('isJsonObject', () => {
  it('should accept plain objects only', () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
  });
});
