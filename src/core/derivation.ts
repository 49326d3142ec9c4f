/**
 * Stage payload shapes and next-stage target derivation.
 *
 * Executors return loosely typed payloads; these schemas are the contract
 * between a stage's output and the tasks the following stage is built from.
 */

import { z } from 'zod';
import type { StageConfig } from '../types/run-config.js';
import type { Payload, Stage, Task, TaskSeed } from '../types/task.js';
import { extractAsin } from '../utils/url-utils.js';

const NextPageSchema = z.string().min(1).nullish();

export const ProductRefSchema = z.object({
  asin: z.string().optional(),
  url: z.string().optional(),
  title: z.string().optional(),
}).refine(ref => Boolean(ref.asin || ref.url), 'product reference needs an asin or a url');

export const CategoryPayloadSchema = z.object({
  products: z.array(ProductRefSchema),
  nextPage: NextPageSchema,
}).passthrough();

export const ProductPayloadSchema = z.object({
  asin: z.string().optional(),
  title: z.string().min(1),
  price: z.union([z.number(), z.string()]).optional(),
  reviewsUrl: z.string().optional(),
}).passthrough();

export const ReviewPayloadSchema = z.object({
  reviews: z.array(z.record(z.string(), z.unknown())),
  nextPage: NextPageSchema,
}).passthrough();

const SCHEMAS = {
  CATEGORY: CategoryPayloadSchema,
  PRODUCT: ProductPayloadSchema,
  REVIEW: ReviewPayloadSchema,
} satisfies Record<Stage, z.ZodTypeAny>;

/**
 * Returns a readable reason when the payload does not fit its stage, null otherwise.
 */
export function validatePayload(stage: Stage, payload: Payload): string | null {
  const result = SCHEMAS[stage].safeParse(payload);
  if (result.success) return null;

  return result.error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Stage that consumes this stage's output, or null for the last one. */
export function nextStage(stage: Stage): Stage | null {
  switch (stage) {
    case 'CATEGORY': return 'PRODUCT';
    case 'PRODUCT': return 'REVIEW';
    case 'REVIEW': return null;
  }
}

/**
 * Dedupe key for a target: its ASIN when one can be read from it,
 * otherwise the target string itself.
 */
export function targetKey(target: string): string {
  return extractAsin(target) ?? target;
}

/**
 * Same-stage follow-up page, if the payload names one and depth allows.
 */
export function nextPageTarget(task: Task, payload: Payload, maxPages: number): string | null {
  if (task.page >= maxPages || task.stage === 'PRODUCT') return null;

  const parsed = z.object({ nextPage: NextPageSchema }).safeParse(payload);
  if (!parsed.success || !parsed.data.nextPage) return null;
  return parsed.data.nextPage;
}

/**
 * Targets a succeeded task contributes to the next stage.
 */
export function derivedTargets(task: Task): string[] {
  if (task.status !== 'SUCCEEDED' || !task.payload) return [];

  switch (task.stage) {
    case 'CATEGORY': {
      const parsed = CategoryPayloadSchema.safeParse(task.payload);
      if (!parsed.success) return [];
      return parsed.data.products.flatMap(ref => {
        const asin = ref.asin ? extractAsin(ref.asin) : null;
        const target = asin ?? ref.url;
        return target ? [target] : [];
      });
    }

    case 'PRODUCT': {
      const parsed = ProductPayloadSchema.safeParse(task.payload);
      if (!parsed.success) return [];
      const asin = extractAsin(parsed.data.asin ?? '') ?? extractAsin(task.target);
      if (asin) return [asin];
      return parsed.data.reviewsUrl ? [parsed.data.reviewsUrl] : [];
    }

    case 'REVIEW':
      return [];
  }
}

/**
 * Build the next stage's seeds: configured targets first, then targets
 * derived from succeeded tasks, deduplicated by target key.
 */
export function deriveNextStage(tasks: readonly Task[], stage: Stage, config: StageConfig): TaskSeed[] {
  const seen = new Set<string>();
  const seeds: TaskSeed[] = [];

  const add = (target: string, parentId?: string): void => {
    const key = targetKey(target);
    if (seen.has(key)) return;
    seen.add(key);
    seeds.push({ stage, target, endpointClass: config.endpointClass, parentId });
  };

  for (const target of config.targets) {
    add(target);
  }
  for (const task of tasks) {
    for (const target of derivedTargets(task)) {
      add(target, task.id);
    }
  }
  return seeds;
}
