import { describe, it, expect } from 'vitest';
import { buildListingUrl, parseList, resolveUrl, sanitizeFilename } from './urls.js';

const BASE = 'https://catalog.example.com';

describe('resolveUrl', () => {
  it('should resolve relative links against the base url', () => {
    expect(resolveUrl('/actors/a1', BASE)).toBe('https://catalog.example.com/actors/a1');
    expect(resolveUrl('https://cdn.example.com/x', BASE)).toBe('https://cdn.example.com/x');
  });

  it('should return null for empty or unparsable links', () => {
    expect(resolveUrl('  ', BASE)).toBeNull();
    expect(resolveUrl('http://[bad', BASE)).toBeNull();
  });
});

describe('buildListingUrl', () => {
  it('should leave the listing untouched without filters', () => {
    expect(buildListingUrl(BASE, '/actors/a1?page=1')).toBe('https://catalog.example.com/actors/a1?page=1');
  });

  it('should replace the tag and sort filters', () => {
    expect(buildListingUrl(BASE, '/actors/a1?t=old&page=1&sort_type=1', ['s', 'd'], '0')).toBe(
      'https://catalog.example.com/actors/a1?page=1&t=s%2Cd&sort_type=0'
    );
  });
});

describe('parseList', () => {
  it('should split and trim comma separated values', () => {
    expect(parseList(' Aoi , Mika,,')).toEqual(['Aoi', 'Mika']);
    expect(parseList(undefined)).toEqual([]);
  });
});

describe('sanitizeFilename', () => {
  it('should replace characters that are not allowed in file names', () => {
    expect(sanitizeFilename('a/b\\c:d*e?f"g<h>i|j')).toBe('a_b_c_d_e_f_g_h_i_j');
  });

  it('should fall back when nothing usable is left', () => {
    expect(sanitizeFilename('///', 'entity')).toBe('entity');
  });
});
