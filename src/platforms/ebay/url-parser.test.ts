import { describe, it, expect } from 'vitest';
import { isActiveListingUrl, isSoldListingUrl, keywordFromUrl, parseSearchUrl } from './url-parser';

const SOLD_URL =
  'https://www.ebay.com/sch/i.html?_nkw=canon+eos+5d%20mark&_sacat=31388&LH_BIN=1&LH_PrefLoc=98&LH_ItemCondition=3000&LH_Sold=1&LH_Complete=1&LH_TitleDesc=0';

describe('parseSearchUrl', () => {
  it('decodes every supported parameter', () => {
    expect(parseSearchUrl(SOLD_URL)).toEqual({
      keyword: 'canon eos 5d mark',
      categoryId: '31388',
      buyItNow: true,
      location: 'Asia',
      conditionId: '3000',
      condition: 'Used',
      soldOnly: true,
      completed: true,
      titleOnly: true,
    });
  });

  it('defaults flags when parameters are absent', () => {
    expect(parseSearchUrl('https://www.ebay.com/sch/i.html?_nkw=nikon')).toEqual({
      keyword: 'nikon',
      categoryId: null,
      buyItNow: false,
      location: null,
      conditionId: null,
      condition: null,
      soldOnly: false,
      completed: false,
      titleOnly: false,
    });
  });

  it('keeps unknown condition ids without a label', () => {
    const params = parseSearchUrl('https://www.ebay.com/sch/i.html?_nkw=x&LH_ItemCondition=4000&LH_PrefLoc=7');
    expect(params?.conditionId).toBe('4000');
    expect(params?.condition).toBeNull();
    expect(params?.location).toBeNull();
  });

  it('returns null for empty, invalid and query-less URLs', () => {
    expect(parseSearchUrl('')).toBeNull();
    expect(parseSearchUrl(null)).toBeNull();
    expect(parseSearchUrl('not a url')).toBeNull();
    expect(parseSearchUrl('https://www.ebay.com/sch/i.html')).toBeNull();
  });
});

describe('URL helpers', () => {
  it('tells active and sold searches apart', () => {
    const active = 'https://www.ebay.com/sch/i.html?_nkw=canon';
    expect(isActiveListingUrl(active)).toBe(true);
    expect(isSoldListingUrl(active)).toBe(false);
    expect(isActiveListingUrl(SOLD_URL)).toBe(false);
    expect(isSoldListingUrl(SOLD_URL)).toBe(true);
  });

  it('extracts the keyword', () => {
    expect(keywordFromUrl(SOLD_URL)).toBe('canon eos 5d mark');
    expect(keywordFromUrl('https://www.ebay.com/sch/i.html?_sacat=1')).toBeNull();
  });
});
