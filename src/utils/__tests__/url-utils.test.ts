import { describe, it, expect } from 'vitest';
import { buildUrl, ensureProtocol, extractAsin, isValidUrl, resolveTargetUrl } from '../url-utils.js';

const BASE = 'https://www.amazon.com';

describe('extractAsin', () => {
  it('should accept a bare product id', () => {
    expect(extractAsin('B000000001')).toBe('B000000001');
    expect(extractAsin(' B000000001 ')).toBe('B000000001');
  });

  it('should read the id from product and review URLs', () => {
    expect(extractAsin('https://www.amazon.com/Desk-Lamp/dp/B000000002/ref=sr_1_1')).toBe('B000000002');
    expect(extractAsin('/gp/product/B000000003?th=1')).toBe('B000000003');
    expect(extractAsin('/product-reviews/B000000004')).toBe('B000000004');
    expect(extractAsin('/exec/obidos/ASIN/B000000005#top')).toBe('B000000005');
  });

  it('should return null when there is no product id', () => {
    expect(extractAsin('/s?k=lamps')).toBeNull();
    expect(extractAsin('b000000001')).toBeNull();
    expect(extractAsin('/dp/B00000000123')).toBeNull();
  });
});

describe('resolveTargetUrl', () => {
  it('should pass absolute URLs through', () => {
    expect(resolveTargetUrl(BASE, 'PRODUCT', 'https://smile.amazon.com/dp/B000000001')).toBe('https://smile.amazon.com/dp/B000000001');
  });

  it('should join site paths onto the base URL', () => {
    expect(resolveTargetUrl(BASE, 'CATEGORY', '/b/?node=172282')).toBe('https://www.amazon.com/b/?node=172282');
  });

  it('should expand a bare product id per stage', () => {
    expect(resolveTargetUrl(BASE, 'PRODUCT', 'B000000001')).toBe('https://www.amazon.com/dp/B000000001');
    expect(resolveTargetUrl(BASE, 'REVIEW', 'B000000001')).toBe('https://www.amazon.com/product-reviews/B000000001');
  });

  it('should turn a category keyword into a search', () => {
    expect(resolveTargetUrl(BASE, 'CATEGORY', 'desk lamp')).toBe('https://www.amazon.com/s?k=desk+lamp');
  });

  it('should refuse a keyword outside the category stage', () => {
    expect(() => resolveTargetUrl(BASE, 'PRODUCT', 'desk lamp')).toThrow('Cannot resolve PRODUCT target to a URL: desk lamp');
  });
});

describe('url helpers', () => {
  it('should add a protocol when missing', () => {
    expect(ensureProtocol('www.amazon.com')).toBe('https://www.amazon.com');
    expect(ensureProtocol('http://localhost:3000')).toBe('http://localhost:3000');
  });

  it('should build URLs with query parameters', () => {
    expect(buildUrl('www.amazon.com', 'dp/B000000001', { th: '1' })).toBe('https://www.amazon.com/dp/B000000001?th=1');
  });

  it('should validate URLs', () => {
    expect(isValidUrl('https://www.amazon.com/dp/B000000001')).toBe(true);
    expect(isValidUrl('not a url')).toBe(false);
  });
});
