/**
 * Colour scheme tests
 */

import { describe, it, expect } from 'vitest';
import { COLORS, colorFor, defaultColorScheme, isColor } from './config.js';

describe('Config - Colour scheme', () => {
  it('should map the standard categories', () => {
    const scheme = defaultColorScheme();
    expect(colorFor(scheme, 'const')).toBe('red');
    expect(colorFor(scheme, 'literal')).toBe('yellow');
    expect(colorFor(scheme, 'type')).toBe('light-yellow');
    expect(colorFor(scheme, 'error')).toBe('light-red');
  });

  it('should degrade unknown categories to the default entry', () => {
    expect(colorFor(defaultColorScheme(), 'not-a-category')).toBe('white');
    expect(colorFor({ default: 'blue' }, 'not-a-category')).toBe('blue');
  });

  it('should not mistake prototype members for scheme entries', () => {
    expect(colorFor(defaultColorScheme(), 'constructor')).toBe('white');
    expect(colorFor(defaultColorScheme(), 'toString')).toBe('white');
    expect(colorFor({ default: 'green' }, 'valueOf')).toBe('green');
    expect(colorFor({}, '__proto__')).toBe('white');
  });

  it('should only use known colours', () => {
    for (const color of Object.values(defaultColorScheme())) {
      expect(COLORS).toContain(color);
    }
  });

  it('should recognise colour names', () => {
    expect(isColor('light-magenta')).toBe(true);
    expect(isColor('purple')).toBe(false);
  });
});
