import { describe, it, expect } from 'vitest';
import { canonicalizeArguments, toolCallKey } from './canonical-arguments.js';

describe('canonicalizeArguments', () => {
  it('should sort keys at every depth', () => {
    expect(canonicalizeArguments('{"b":1,"a":{"d":[2,1],"c":true}}')).toBe('{"a":{"c":true,"d":[2,1]},"b":1}');
  });

  it('should drop whitespace', () => {
    expect(canonicalizeArguments('{ "query" : "rain",\n "limit": 3 }')).toBe('{"limit":3,"query":"rain"}');
  });

  it('should keep array order', () => {
    expect(canonicalizeArguments('[3,1,2]')).toBe('[3,1,2]');
  });

  it('should keep __proto__ keys', () => {
    expect(canonicalizeArguments('{"__proto__":{"b":2,"a":1}}')).toBe('{"__proto__":{"a":1,"b":2}}');
    expect(canonicalizeArguments('{"__proto__":{"a":1}}')).not.toBe(canonicalizeArguments('{"__proto__":{"b":2}}'));
  });

  it('should fall back to trimmed text for invalid JSON', () => {
    expect(canonicalizeArguments('  not json ')).toBe('not json');
  });
});

describe('toolCallKey', () => {
  it('should match calls that differ only in key order', () => {
    expect(toolCallKey('search', '{"q":"x","n":1}')).toBe(toolCallKey('search', '{"n":1,"q":"x"}'));
  });

  it('should separate tools with the same arguments', () => {
    expect(toolCallKey('search', '{}')).not.toBe(toolCallKey('fetch', '{}'));
  });
});
