/**
 * Tests for artifact schema helpers
 */

import { describe, it, expect } from 'vitest';
import { formatSchemaIssues } from '../schemas';

describe('formatSchemaIssues', () => {
  it('should join issues on one line and omit empty paths', () => {
    expect(formatSchemaIssues([
      { path: 'block_id', message: 'Required' },
      { path: '', message: 'not valid JSON' },
      { path: 'otests.0.id', message: 'too short' },
    ])).toBe('block_id: Required; not valid JSON; otests.0.id: too short');
  });

  it('should return an empty string for no issues', () => {
    expect(formatSchemaIssues([])).toBe('');
  });
});
