/**
 * Memory type classification rule table
 */

import { describe, it, expect } from 'vitest';
import { classifyMemoryType, classifyWithReason } from '../memory/classifier';

describe('classifyMemoryType', () => {
  it('lets preferences win over decisions', () => {
    expect(classifyMemoryType('We decided on Postgres because I prefer SQL')).toBe('preferences');
  });

  it('matches keywords as substrings', () => {
    const result = classifyWithReason('She liked the blue palette');
    expect(result.memoryType).toBe('preferences');
    expect(result.matchedKeyword).toBe('like');
  });

  it('is case-insensitive', () => {
    expect(classifyMemoryType('We CHOSE Postgres')).toBe('decisions');
  });

  it('recognizes experiences', () => {
    expect(classifyMemoryType('Built the ingestion pipeline')).toBe('experiences');
  });

  it('recognizes skills', () => {
    expect(classifyMemoryType('How to rotate the API keys')).toBe('skills');
  });

  it('looks at tags for context', () => {
    expect(classifyMemoryType('Service runs on port 8080', ['project-x'])).toBe('context');
  });

  it('does not look at content for the tag rule', () => {
    expect(classifyMemoryType('The project runs on port 8080')).toBe('facts');
  });

  it('defaults to facts', () => {
    const result = classifyWithReason('Water boils at 100 degrees');
    expect(result).toEqual({ memoryType: 'facts', rule: null, matchedKeyword: null });
  });
});
