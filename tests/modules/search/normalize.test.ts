import { describe, it, expect } from '@jest/globals';
import { matchesToken, normalizeSearchTerm, tokenize } from '../../../src/modules/search/normalize';

describe('normalizeSearchTerm', () => {
  it('folds Turkish letters, trims and lower-cases', () => {
    expect(normalizeSearchTerm('  Çift Şişe  ')).toBe('cift sise');
    expect(normalizeSearchTerm('ığüşöç')).toBe('igusoc');
    expect(normalizeSearchTerm('ĞÜŞÖÇ')).toBe('gusoc');
  });

  it('treats dotted and dotless capitals like their lower-case forms', () => {
    expect(normalizeSearchTerm('İstanbul')).toBe('istanbul');
    expect(normalizeSearchTerm('ISPARTA')).toBe('isparta');
    expect(normalizeSearchTerm('İstanbul')).toBe(normalizeSearchTerm('istanbul'));
  });

  it('returns an empty string for absent input', () => {
    expect(normalizeSearchTerm(null)).toBe('');
    expect(normalizeSearchTerm(undefined)).toBe('');
    expect(normalizeSearchTerm('')).toBe('');
  });
});

describe('matchesToken', () => {
  it('matches a folded token against a Turkish field', () => {
    expect(matchesToken('Çamaşır Makinesi', 'camasir')).toBe(true);
  });

  it('matches a Turkish token against an ASCII field', () => {
    expect(matchesToken('Camasir Askisi', 'çamaşır')).toBe(true);
  });

  it('ignores case on the raw side', () => {
    expect(matchesToken('KLOZET', 'klo')).toBe(true);
    expect(matchesToken('klozet', 'KLO')).toBe(true);
  });

  it('never matches an empty or absent field', () => {
    expect(matchesToken(null, 'a')).toBe(false);
    expect(matchesToken(undefined, 'a')).toBe(false);
    expect(matchesToken('', 'a')).toBe(false);
  });

  it('rejects unrelated text', () => {
    expect(matchesToken('Lavabo', 'klozet')).toBe(false);
  });
});

describe('tokenize', () => {
  it('splits on any run of whitespace', () => {
    expect(tokenize('  beyaz \t  klozet ')).toEqual(['beyaz', 'klozet']);
  });

  it('yields no tokens for blank input', () => {
    expect(tokenize('   ')).toEqual([]);
    expect(tokenize(undefined)).toEqual([]);
  });
});
