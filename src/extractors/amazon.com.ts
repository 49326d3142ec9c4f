import type { PageExtractor } from '../types/executor.js';
import type { Payload, Stage, Task } from '../types/task.js';
import { logger } from '../utils/logger.js';
import { extractAsin } from '../utils/url-utils.js';

const log = logger.createContext('amazon.com');

/** The slice of playwright's Locator the selectors below need. */
interface Query {
  count(): Promise<number>;
  first(): Query;
  all(): Promise<Query[]>;
  locator(selector: string): Query;
  textContent(): Promise<string | null>;
  getAttribute(name: string): Promise<string | null>;
}

/** The slice of playwright's Page the selectors below need. */
interface SitePage {
  url(): string;
  locator(selector: string): Query;
}

export const SELECTORS = {
  searchResult: "div[data-component-type='s-search-result']",
  resultTitle: 'h2 a span, h2 span',
  resultPrice: '.a-price .a-offscreen',
  nextPage: 'a.s-pagination-next, li.a-last a',
  productTitle: 'span#productTitle',
  productPrice: 'span.a-price-whole',
  productRating: 'i.a-icon-star span.a-icon-alt',
  productFeatures: 'div#feature-bullets ul li',
  allReviewsLink: 'a[data-hook="see-all-reviews-link-foot"]',
  review: 'div[data-hook="review"]',
  reviewAuthor: 'span.a-profile-name',
  reviewRating: 'i[data-hook="review-star-rating"], i[data-hook="cmps-review-star-rating"]',
  reviewTitle: 'a[data-hook="review-title"], span[data-hook="review-title"]',
  reviewDate: 'span[data-hook="review-date"]',
  reviewVerified: 'span[data-hook="avp-badge"]',
  reviewBody: 'span[data-hook="review-body"]',
  reviewHelpful: 'span[data-hook="helpful-vote-statement"]',
};

async function text(locator: Query): Promise<string | undefined> {
  if (await locator.count() === 0) return undefined;
  const value = await locator.first().textContent();
  return value?.trim() || undefined;
}

async function href(page: SitePage, selector: string): Promise<string | null> {
  const locator = page.locator(selector);
  if (await locator.count() === 0) return null;
  const value = await locator.first().getAttribute('href');
  return value ? new URL(value, page.url()).toString() : null;
}

// "4.5 out of 5 stars" -> 4.5
function parseRating(value: string | undefined): number | undefined {
  const match = value ? /(\d(?:[.,]\d)?) out/.exec(value) : null;
  return match ? Number(match[1].replace(',', '.')) : undefined;
}

async function extractCategory(page: SitePage): Promise<Payload> {
  const products: Array<{ asin: string; title?: string; price?: string }> = [];

  for (const card of await page.locator(SELECTORS.searchResult).all()) {
    const asin = (await card.getAttribute('data-asin'))?.trim();
    if (!asin) continue;
    products.push({
      asin,
      title: await text(card.locator(SELECTORS.resultTitle)),
      price: await text(card.locator(SELECTORS.resultPrice))
    });
  }

  log.debug(`Found ${products.length} products on ${page.url()}`);
  return { products, nextPage: await href(page, SELECTORS.nextPage) };
}

async function extractProduct(page: SitePage, task: Task): Promise<Payload> {
  const features: string[] = [];
  for (const item of await page.locator(SELECTORS.productFeatures).all()) {
    const feature = (await item.textContent())?.trim();
    if (feature) features.push(feature);
  }

  return {
    asin: extractAsin(task.target) ?? extractAsin(page.url()) ?? undefined,
    title: await text(page.locator(SELECTORS.productTitle)),
    price: await text(page.locator(SELECTORS.productPrice)),
    rating: parseRating(await text(page.locator(SELECTORS.productRating))),
    features,
    reviewsUrl: (await href(page, SELECTORS.allReviewsLink)) ?? undefined
  };
}

async function extractReviews(page: SitePage): Promise<Payload> {
  const reviews: Array<Record<string, unknown>> = [];

  for (const review of await page.locator(SELECTORS.review).all()) {
    reviews.push({
      id: await review.getAttribute('id'),
      author: await text(review.locator(SELECTORS.reviewAuthor)),
      rating: parseRating(await text(review.locator(SELECTORS.reviewRating))),
      title: await text(review.locator(SELECTORS.reviewTitle)),
      date: await text(review.locator(SELECTORS.reviewDate)),
      verified: await review.locator(SELECTORS.reviewVerified).count() > 0,
      body: await text(review.locator(SELECTORS.reviewBody)),
      helpful: await text(review.locator(SELECTORS.reviewHelpful))
    });
  }

  return { reviews, nextPage: await href(page, SELECTORS.nextPage) };
}

const extractor = {
  async extract(stage: Stage, page: SitePage, task: Task): Promise<Payload> {
    switch (stage) {
      case 'CATEGORY':
        return extractCategory(page);
      case 'PRODUCT':
        return extractProduct(page, task);
      case 'REVIEW':
        return extractReviews(page);
    }
  }
} satisfies PageExtractor;

export default extractor;
