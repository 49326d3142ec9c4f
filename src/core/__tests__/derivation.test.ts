import { describe, it, expect } from 'vitest';
import { deriveNextStage, derivedTargets, nextPageTarget, nextStage, targetKey, validatePayload } from '../derivation.js';
import type { Task } from '../../types/task.js';

const task = (overrides: Partial<Task>): Task => ({
  id: 'category-1',
  stage: 'CATEGORY',
  target: '/b/electronics',
  endpointClass: 'html',
  attempts: 1,
  nextEligibleAt: 0,
  status: 'SUCCEEDED',
  page: 1,
  ...overrides
});

describe('validatePayload', () => {
  it('should accept a category listing', () => {
    expect(validatePayload('CATEGORY', { products: [{ asin: 'B000000001' }], nextPage: null })).toBeNull();
  });

  it('should require an asin or url on every product reference', () => {
    expect(validatePayload('CATEGORY', { products: [{ title: 'Lamp' }] })).toBe(
      'products.0: product reference needs an asin or a url'
    );
  });

  it('should require a product title', () => {
    expect(validatePayload('PRODUCT', { asin: 'B000000001' })).toBe('title: Required');
  });

  it('should require a reviews array', () => {
    expect(validatePayload('REVIEW', { reviews: [{ rating: 5 }] })).toBeNull();
    expect(validatePayload('REVIEW', {})).toBe('reviews: Required');
  });
});

describe('derivation', () => {
  it('should order stages category, product, review', () => {
    expect(nextStage('CATEGORY')).toBe('PRODUCT');
    expect(nextStage('PRODUCT')).toBe('REVIEW');
    expect(nextStage('REVIEW')).toBeNull();
  });

  it('should key targets by asin where one is present', () => {
    expect(targetKey('https://www.amazon.com/Some-Lamp/dp/B000000001/ref=sr_1_1')).toBe('B000000001');
    expect(targetKey('/b/electronics')).toBe('/b/electronics');
  });

  it('should derive product targets from a category listing', () => {
    const listing = task({
      payload: {
        products: [
          { asin: 'B000000001', title: 'Lamp' },
          { url: 'https://www.amazon.com/dp/B000000002' }
        ]
      }
    });
    expect(derivedTargets(listing)).toEqual(['B000000001', 'https://www.amazon.com/dp/B000000002']);
  });

  it('should derive a review target from a product', () => {
    const product = task({ id: 'product-2', stage: 'PRODUCT', target: '/dp/B000000003', payload: { title: 'Desk' } });
    expect(derivedTargets(product)).toEqual(['B000000003']);
  });

  it('should derive nothing from failed tasks', () => {
    const failed = task({ status: 'FAILED_PERMANENT', payload: { products: [{ asin: 'B000000001' }] } });
    expect(derivedTargets(failed)).toEqual([]);
  });

  it('should merge configured seeds and dedupe across source tasks', () => {
    const seeds = deriveNextStage(
      [
        task({ id: 'category-1', payload: { products: [{ asin: 'B000000001' }, { asin: 'B000000002' }] } }),
        task({ id: 'category-2', payload: { products: [{ asin: 'B000000002' }, { url: '/dp/B000000003' }] } }),
        task({ id: 'category-3', status: 'FAILED_PERMANENT', payload: { products: [{ asin: 'B000000009' }] } })
      ],
      'PRODUCT',
      { endpointClass: 'html', targets: ['/dp/B000000003', '/dp/B000000004'], maxPages: 1 }
    );

    expect(seeds).toEqual([
      { stage: 'PRODUCT', target: '/dp/B000000003', endpointClass: 'html', parentId: undefined },
      { stage: 'PRODUCT', target: '/dp/B000000004', endpointClass: 'html', parentId: undefined },
      { stage: 'PRODUCT', target: 'B000000001', endpointClass: 'html', parentId: 'category-1' },
      { stage: 'PRODUCT', target: 'B000000002', endpointClass: 'html', parentId: 'category-1' }
    ]);
  });

  it('should follow nextPage only below maxPages', () => {
    const payload = { products: [], nextPage: '/s?k=lamp&page=2' };
    expect(nextPageTarget(task({ page: 1 }), payload, 2)).toBe('/s?k=lamp&page=2');
    expect(nextPageTarget(task({ page: 2 }), payload, 2)).toBeNull();
    expect(nextPageTarget(task({ page: 1 }), { products: [], nextPage: null }, 5)).toBeNull();
  });
});
