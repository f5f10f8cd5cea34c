import { describe, expect, it } from 'vitest';
import { parseListingHtml } from './listing-parser.js';
import { SITE_URL, listingItem, listingPage } from '../test-support/fixtures.js';

const page = listingPage([
  listingItem({ href: '/politik/rapat-kabinet-1', title: 'Rapat Kabinet' }),
  listingItem({ href: 'https://www.tempo.co/hukum/sidang-2', title: 'Sidang Lanjutan', premium: true }),
  // No figure: skipped
  '<div><p><a href="/ekonomi/skip">Tanpa figure</a></p></div>',
  // Link without href: skipped
  '<div><figure><figcaption><p><a>Tanpa tautan</a></p></figcaption></figure></div>',
  listingItem({ href: '/olahraga/final-3', title: '  Final Liga  ' }),
  listingItem({ href: '/', title: 'Beranda' }),
]);

describe('parseListingHtml', () => {
  it('extracts stubs in document order, skipping incomplete items', () => {
    const { containerFound, stubs } = parseListingHtml(page, 20, SITE_URL);

    expect(containerFound).toBe(true);
    expect(stubs).toEqual([
      { url: '/politik/rapat-kabinet-1', title: 'Rapat Kabinet', category: 'politik', isFree: true },
      { url: 'https://www.tempo.co/hukum/sidang-2', title: 'Sidang Lanjutan', category: 'hukum', isFree: false },
      { url: '/olahraga/final-3', title: 'Final Liga', category: 'olahraga', isFree: true },
      { url: '/', title: 'Beranda', category: 'indeks', isFree: true },
    ]);
  });

  it('caps at the limit without counting skipped items', () => {
    const { stubs } = parseListingHtml(page, 3, SITE_URL);
    expect(stubs.map((stub) => stub.title)).toEqual(['Rapat Kabinet', 'Sidang Lanjutan', 'Final Liga']);
  });

  it('returns min(limit, available) stubs', () => {
    for (const limit of [1, 2, 4, 10]) {
      expect(parseListingHtml(page, limit, SITE_URL).stubs).toHaveLength(Math.min(limit, 4));
    }
  });

  it('yields the same stubs when parsing the same markup twice', () => {
    expect(parseListingHtml(page, 20, SITE_URL)).toEqual(parseListingHtml(page, 20, SITE_URL));
  });

  it('treats each direct child as one item and searches inside it', () => {
    const nested = listingPage([
      `<div><section>${listingItem({ href: '/sains/nested', title: 'Nested' })}</section></div>`,
    ]);
    expect(parseListingHtml(nested, 20, SITE_URL).stubs).toEqual([
      { url: '/sains/nested', title: 'Nested', category: 'sains', isFree: true },
    ]);
  });

  it('reports a missing container as a soft miss', () => {
    const html = '<html><body><div class="flex flex-col">nothing here</div></body></html>';
    expect(parseListingHtml(html, 20, SITE_URL)).toEqual({ containerFound: false, stubs: [] });
  });

  it('returns an empty list for an empty container', () => {
    expect(parseListingHtml(listingPage([]), 20, SITE_URL)).toEqual({ containerFound: true, stubs: [] });
  });
});
