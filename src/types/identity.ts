export interface Proxy {
  id: string;
  url: string;
  provider?: string;
  type?: 'residential' | 'datacenter';
  geo?: string;  // 2-letter ISO code: 'US', 'UK', etc.
  username?: string;
  password?: string;
  endpointClasses?: string[];  // Restrict to these endpoint classes; all when omitted
}

export interface PlaywrightProxy {
  server: string;
  username?: string;
  password?: string;
}

export interface Identity {
  id: string;
  proxy: Proxy | null;
  userAgent: string;
}

export type RotationPolicy =
  | { strategy: 'round-robin' }
  | { strategy: 'random' }
  | { strategy: 'sticky'; intervalMs: number };

export type RotationStrategy = RotationPolicy['strategy'];

/**
 * How an attempt ended from the identity's point of view.
 * Only identity_failure counts towards degradation.
 */
export type ReleaseOutcome = 'success' | 'identity_failure' | 'target_failure';

export interface IdentityStats {
  id: string;
  proxyId: string | null;
  checkouts: number;
  consecutiveFailures: number;
  totalFailures: number;
  degradedUntil: number | null;
  inUse: boolean;
}
