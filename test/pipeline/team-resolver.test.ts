import { describe, it, expect } from 'vitest';
import {
  TeamResolver,
  cleanTeamName,
  createTeamResolver,
  loadDefaultAliases,
} from '../../src/pipeline/team-resolver.js';

describe('cleanTeamName', () => {
  it('should collapse whitespace and trim', () => {
    expect(cleanTeamName('  Team \n  Heretics ')).toBe('Team Heretics');
  });

  it('should apply NFKC', () => {
    expect(cleanTeamName('ＦＮＣ')).toBe('FNC');
  });

  it('should drop a trailing rating tag', () => {
    expect(cleanTeamName('FNATIC [1888]')).toBe('FNATIC');
  });

  it('should never truncate', () => {
    const long = 'A Very Long Team Name That Goes On And On Past Any Column Width Limit';
    expect(cleanTeamName(long)).toBe(long);
  });

  it('should return null for empty input', () => {
    expect(cleanTeamName(null)).toBeNull();
    expect(cleanTeamName('   ')).toBeNull();
  });
});

describe('TeamResolver', () => {
  const resolver = createTeamResolver();

  it('should load the bundled alias table', () => {
    expect(loadDefaultAliases()['FNATIC']).toEqual(['Fnatic', 'FNC']);
    expect(resolver.size).toBeGreaterThan(25);
  });

  it('should resolve aliases case-insensitively', () => {
    expect(resolver.resolve('fnc')).toBe('FNATIC');
    expect(resolver.resolve('Fnatic')).toBe('FNATIC');
    expect(resolver.resolve('KRU Esports')).toBe('KRÜ Esports');
    expect(resolver.resolve('leviatan')).toBe('LEVIATÁN');
    expect(resolver.resolve('EDG')).toBe('EDward Gaming');
  });

  it('should map a canonical name onto itself', () => {
    expect(resolver.resolve('sentinels')).toBe('Sentinels');
  });

  it('should pass unknown names through cleaned', () => {
    expect(resolver.resolve('  Bleed   Esports ')).toBe('Bleed Esports');
  });

  it('should give every casing of an unlisted team the first spelling seen', () => {
    const fresh = createTeamResolver();
    expect(fresh.resolve('TEAM SECRET')).toBe('TEAM SECRET');
    expect(fresh.resolve('Team Secret')).toBe('TEAM SECRET');
    expect(fresh.resolve(' team   secret ')).toBe('TEAM SECRET');
    expect(fresh.size).toBe(resolver.size);
  });

  it('should return null for missing names', () => {
    expect(resolver.resolve(null)).toBeNull();
    expect(resolver.resolve('')).toBeNull();
  });

  it('should take run-specific aliases on top of the bundled ones', () => {
    const custom = createTeamResolver({ 'Bleed Esports': ['BLD'] });
    expect(custom.resolve('bld')).toBe('Bleed Esports');
    expect(custom.resolve('FNC')).toBe('FNATIC');
  });

  it('should let later tables override earlier ones', () => {
    const custom = new TeamResolver({ Alpha: ['X'] }, { Bravo: ['X'] });
    expect(custom.resolve('x')).toBe('Bravo');
  });
});
