/**
 * Identity Rotator
 *
 * Hands out (proxy, user-agent) identities per attempt under a fixed
 * rotation policy and keeps per-identity health:
 * - an identity is exclusive to one attempt between checkout and release
 * - consecutive identity failures reaching the threshold degrade it
 * - a degraded identity is skipped until its cooldown has elapsed
 */

import type {
  Identity,
  IdentityStats,
  Proxy,
  ReleaseOutcome,
  RotationPolicy
} from '../types/identity.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { logger } from '../utils/logger.js';

const log = logger.createContext('identity-rotator');

export class ExhaustedPoolError extends Error {
  override readonly name = 'ExhaustedPoolError';

  constructor(
    readonly endpointClass: string,
    /** Time until the earliest degraded identity cools down, when that is what blocks the pool */
    readonly retryAfterMs?: number
  ) {
    super(`No usable identity for endpoint class "${endpointClass}"`);
  }
}

/**
 * No identity in the pool is configured for the endpoint class, so waiting cannot help.
 */
export class UnservedEndpointError extends Error {
  override readonly name = 'UnservedEndpointError';

  constructor(readonly endpointClass: string) {
    super(`No identity serves endpoint class "${endpointClass}"`);
  }
}

export interface IdentityRotatorOptions {
  rotation: RotationPolicy;
  failureThreshold: number;
  cooldownMs: number;
  clock?: Clock;
  random?: () => number;
}

interface IdentitySlot {
  identity: Identity;
  endpointClasses: Set<string> | null;
  inUse: boolean;
  checkouts: number;
  consecutiveFailures: number;
  totalFailures: number;
  degradedUntil: number | null;
}

/**
 * One identity per proxy, user agents assigned in order over the proxies.
 * Without proxies, one direct identity per user agent.
 */
export function buildIdentities(proxies: Proxy[], userAgents: string[]): Identity[] {
  if (userAgents.length === 0) {
    throw new Error('At least one user agent is required to build identities');
  }

  if (proxies.length === 0) {
    return userAgents.map((userAgent, index) => ({
      id: `direct-${index + 1}`,
      proxy: null,
      userAgent
    }));
  }

  return proxies.map((proxy, index) => ({
    id: proxy.id,
    proxy,
    userAgent: userAgents[index % userAgents.length]
  }));
}

export class IdentityRotator {
  private readonly slots: IdentitySlot[];
  private readonly slotById = new Map<string, IdentitySlot>();
  private readonly clock: Clock;
  private readonly random: () => number;
  private cursor = 0;
  private sticky: { slot: IdentitySlot; since: number } | null = null;

  constructor(identities: Identity[], private readonly options: IdentityRotatorOptions) {
    if (identities.length === 0) {
      throw new Error('Identity pool is empty');
    }

    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? Math.random;
    this.slots = identities.map(identity => ({
      identity,
      endpointClasses: identity.proxy?.endpointClasses ? new Set(identity.proxy.endpointClasses) : null,
      inUse: false,
      checkouts: 0,
      consecutiveFailures: 0,
      totalFailures: 0,
      degradedUntil: null
    }));

    for (const slot of this.slots) {
      if (this.slotById.has(slot.identity.id)) {
        throw new Error(`Duplicate identity id: ${slot.identity.id}`);
      }
      this.slotById.set(slot.identity.id, slot);
    }

    log.debug(`Pool of ${this.slots.length} identities, strategy ${options.rotation.strategy}`);
  }

  get size(): number {
    return this.slots.length;
  }

  checkout(endpointClass: string): Identity {
    const now = this.clock.now();
    const candidates = this.slots.filter(slot => this.servesClass(slot, endpointClass));
    if (candidates.length === 0) throw new UnservedEndpointError(endpointClass);
    const available = candidates.filter(slot => !slot.inUse && this.isHealthy(slot, now));

    if (available.length === 0) {
      throw new ExhaustedPoolError(endpointClass, this.cooldownRemaining(candidates, now));
    }

    const slot = this.pick(available, now);
    slot.inUse = true;
    slot.checkouts++;
    return slot.identity;
  }

  release(identity: Identity, outcome: ReleaseOutcome): void {
    const slot = this.slotById.get(identity.id);
    if (!slot) {
      throw new Error(`Unknown identity: ${identity.id}`);
    }
    if (!slot.inUse) {
      throw new Error(`Identity ${identity.id} released without being checked out`);
    }

    slot.inUse = false;

    switch (outcome) {
      case 'success':
        slot.consecutiveFailures = 0;
        break;
      case 'identity_failure':
        slot.consecutiveFailures++;
        slot.totalFailures++;
        if (slot.consecutiveFailures >= this.options.failureThreshold) {
          slot.degradedUntil = this.clock.now() + this.options.cooldownMs;
          log.normal(`Identity ${identity.id} degraded after ${slot.consecutiveFailures} failures, cooling down for ${this.options.cooldownMs}ms`);
        }
        break;
      case 'target_failure':
        // Not the identity's fault; health unchanged
        break;
    }
  }

  stats(): IdentityStats[] {
    return this.slots.map(slot => ({
      id: slot.identity.id,
      proxyId: slot.identity.proxy?.id ?? null,
      checkouts: slot.checkouts,
      consecutiveFailures: slot.consecutiveFailures,
      totalFailures: slot.totalFailures,
      degradedUntil: slot.degradedUntil,
      inUse: slot.inUse
    }));
  }

  private servesClass(slot: IdentitySlot, endpointClass: string): boolean {
    return slot.endpointClasses === null || slot.endpointClasses.has(endpointClass);
  }

  private isHealthy(slot: IdentitySlot, now: number): boolean {
    if (slot.degradedUntil === null) return true;
    if (now < slot.degradedUntil) return false;

    // Cooldown over: back in rotation with a clean slate
    slot.degradedUntil = null;
    slot.consecutiveFailures = 0;
    log.normal(`Identity ${slot.identity.id} back in rotation`);
    return true;
  }

  private cooldownRemaining(candidates: IdentitySlot[], now: number): number | undefined {
    if (candidates.some(slot => slot.inUse)) {
      // Something will be released soon; no point naming a cooldown
      return undefined;
    }

    const until = candidates
      .map(slot => slot.degradedUntil)
      .filter((value): value is number => value !== null);

    return until.length > 0 ? Math.max(0, Math.min(...until) - now) : undefined;
  }

  private pick(available: IdentitySlot[], now: number): IdentitySlot {
    const policy = this.options.rotation;

    switch (policy.strategy) {
      case 'round-robin':
        return this.nextInOrder(available);

      case 'random':
        return available[Math.min(available.length - 1, Math.floor(this.random() * available.length))];

      case 'sticky': {
        const current = this.sticky;
        if (current && now - current.since < policy.intervalMs && available.includes(current.slot)) {
          return current.slot;
        }

        const expired = !current || now - current.since >= policy.intervalMs || current.slot.degradedUntil !== null;
        if (!expired) {
          // Sticky identity is busy with another attempt; lend the next one without rotating
          return this.nextInOrder(available);
        }

        const next = this.nextInOrder(available.filter(slot => slot !== current?.slot), available);
        this.sticky = { slot: next, since: now };
        log.debug(`Sticky identity rotated to ${next.identity.id}`);
        return next;
      }
    }
  }

  /**
   * First slot at or after the cursor, in configured pool order.
   */
  private nextInOrder(preferred: IdentitySlot[], fallback: IdentitySlot[] = preferred): IdentitySlot {
    const pool = preferred.length > 0 ? preferred : fallback;

    for (let offset = 0; offset < this.slots.length; offset++) {
      const index = (this.cursor + offset) % this.slots.length;
      const slot = this.slots[index];
      if (pool.includes(slot)) {
        this.cursor = (index + 1) % this.slots.length;
        return slot;
      }
    }

    // pool is never empty here: checkout throws before picking from nothing
    return pool[0];
  }
}
