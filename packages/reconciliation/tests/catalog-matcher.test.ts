import { describe, expect, it } from 'vitest';
import {
  CatalogMatcher,
  leadingChars,
  NO_CATALOG_MATCH,
} from '../src/catalog/index.js';
import { catalogOf, thrown } from './helpers.js';

const blackMamba = catalogOf('Black Mamba Distillate 1G', 'Black Mamba Live Resin 1G');

describe('CatalogMatcher', () => {
  it('matches on the first 15 characters of the query', () => {
    const matcher = new CatalogMatcher(blackMamba);

    expect(matcher.match('Black Mamba Distillate 1G - Batch 42')).toBe('Black Mamba Distillate 1G');
  });

  it('tolerates damage after the prefix', () => {
    const matcher = new CatalogMatcher(blackMamba);

    expect(matcher.match('Black Mamba Distlate lG')).toBe('Black Mamba Distillate 1G');
  });

  it('finds the prefix anywhere inside a catalog name', () => {
    const matcher = new CatalogMatcher(catalogOf('Acme - Gelato Pre-Roll 1G'));

    expect(matcher.match('Gelato Pre-Roll 1G x2')).toBe('Acme - Gelato Pre-Roll 1G');
  });

  it('ignores case and surrounding whitespace', () => {
    const matcher = new CatalogMatcher(blackMamba);

    expect(matcher.match('  BLACK MAMBA LIVE RESIN 1G  ')).toBe('Black Mamba Live Resin 1G');
  });

  it('treats the query as literal text', () => {
    const matcher = new CatalogMatcher(catalogOf('Kush (Indica) 3.5g'));

    expect(matcher.match('Kush (Indica) 3.5g Jar')).toBe('Kush (Indica) 3.5g');
  });

  it('returns the no-match sentinel when nothing corresponds', () => {
    const matcher = new CatalogMatcher(blackMamba);

    expect(matcher.match('Purple Punch Gummies 10pk')).toBe(NO_CATALOG_MATCH);
    expect(matcher.matchEntry('Purple Punch Gummies 10pk')).toBeNull();
  });

  it('returns the no-match sentinel for a blank query', () => {
    const matcher = new CatalogMatcher(blackMamba);

    expect(matcher.match('   ')).toBe('');
  });

  it('uses catalog order among several hits by default', () => {
    const matcher = new CatalogMatcher(catalogOf('Big RSO 1G Syringe', 'RSO 1G'));

    expect(matcher.matchEntry('rso 1g')).toEqual({
      entry: { canonicalName: 'Big RSO 1G Syringe', normalizedKey: 'big rso 1g syringe' },
      kind: 'prefix',
    });
  });

  it('picks the closest hit when configured', () => {
    const matcher = new CatalogMatcher(catalogOf('Big RSO 1G Syringe', 'RSO 1G'), {
      tieBreak: 'closest',
    });

    expect(matcher.match('rso 1g')).toBe('RSO 1G');
  });

  it('honours a configured prefix length', () => {
    const entries = catalogOf('Black Mamba Distillate 1G');

    expect(new CatalogMatcher(entries).match('Black Cherry Soda')).toBe('');
    expect(new CatalogMatcher(entries, { prefixLength: 5 }).match('Black Cherry Soda')).toBe(
      'Black Mamba Distillate 1G'
    );
  });

  it('refuses an empty catalog', () => {
    expect(thrown(() => new CatalogMatcher([]))).toMatchObject({ code: 'CATALOG_EMPTY' });
  });

  it('refuses a prefix length below one', () => {
    expect(thrown(() => new CatalogMatcher(blackMamba, { prefixLength: 0 }))).toMatchObject({
      code: 'INVALID_CONFIG',
    });
  });
});

describe('leadingChars', () => {
  it('counts code points, not UTF-16 units', () => {
    expect(leadingChars('🌿🌿 kush', 3)).toBe('🌿🌿 ');
  });
});
