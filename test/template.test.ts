import { describe, it, expect } from 'vitest';
import { expandArgs, expandPlaceholders } from '../src/utils/template.js';

describe('expandPlaceholders', () => {
  it('replaces known names', () => {
    expect(expandPlaceholders('--rcfile={root}/coverage.conf', { root: '/suite' })).toBe('--rcfile=/suite/coverage.conf');
    expect(expandPlaceholders('port = {port}', { port: 5767 })).toBe('port = 5767');
  });

  it('leaves unknown names untouched', () => {
    expect(expandPlaceholders('{nope} and {port}', { port: 1 })).toBe('{nope} and 1');
  });

  it('expands every argument', () => {
    expect(expandArgs(['-w', '{target}', '--xunit-file', '{report}'], { target: '/t', report: '/r.xml' }))
      .toEqual(['-w', '/t', '--xunit-file', '/r.xml']);
  });
});
