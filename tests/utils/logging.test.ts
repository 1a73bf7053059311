import { describe, it, expect } from '@jest/globals';
import { parseRetention, parseRotation } from '../../src/utils/logging';

describe('parseRotation', () => {
  it('rotates by size', () => {
    expect(parseRotation('10MB')).toEqual({ maxSize: '10MB' });
    expect(parseRotation('512KB')).toEqual({ maxSize: '512KB' });
  });

  it('rotates daily or hourly by file name pattern', () => {
    expect(parseRotation('1 day')).toEqual({ datePattern: 'YYYY-MM-DD' });
    expect(parseRotation('1 hour')).toEqual({ datePattern: 'YYYY-MM-DD-HH' });
  });

  it('falls back to 10MB for anything else', () => {
    expect(parseRotation('weekly')).toEqual({ maxSize: '10MB' });
  });
});

describe('parseRetention', () => {
  it('converts days and hours to the rotate-file shorthand', () => {
    expect(parseRetention('30 days')).toBe('30d');
    expect(parseRetention('12 hours')).toBe('12h');
    expect(parseRetention('7d')).toBe('7d');
  });

  it('keeps 30 days when the value is not understood', () => {
    expect(parseRetention('forever')).toBe('30d');
  });
});
