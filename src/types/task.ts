export const STAGES = ['CATEGORY', 'PRODUCT', 'REVIEW'] as const;

export type Stage = typeof STAGES[number];

export type TaskStatus =
  | 'PENDING'
  | 'IN_FLIGHT'
  | 'SUCCEEDED'
  | 'FAILED_RETRYABLE'
  | 'FAILED_PERMANENT';

export const TERMINAL_STATUSES: readonly TaskStatus[] = ['SUCCEEDED', 'FAILED_PERMANENT'];

/**
 * Field name to extracted value. Field sets vary by stage, so the shape
 * is only checked by the stage validators in core/derivation.
 */
export type Payload = Record<string, unknown>;

export type ErrorKind =
  | { kind: 'timeout' }
  | { kind: 'connection_failed'; message?: string }
  | { kind: 'http_status'; status: number }
  | { kind: 'parse_failure'; message?: string }
  | { kind: 'blocked'; reason?: string };

export type ExtractionResult =
  | { ok: true; payload: Payload }
  | { ok: false; error: ErrorKind };

export interface Task {
  id: string;
  stage: Stage;
  target: string;           // URL or ASIN-like key
  endpointClass: string;    // fixed at creation
  attempts: number;
  nextEligibleAt: number;   // epoch ms
  status: TaskStatus;
  page: number;             // 1-based pagination depth within the stage
  parentId?: string;
  lastError?: ErrorKind;
  payload?: Payload;
}

export interface TaskSeed {
  stage: Stage;
  target: string;
  endpointClass: string;
  page?: number;
  parentId?: string;
  notBefore?: number;
}

export function isTerminal(status: TaskStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function describeError(error: ErrorKind): string {
  switch (error.kind) {
    case 'http_status':
      return `HTTP ${error.status}`;
    case 'timeout':
      return 'timeout';
    case 'connection_failed':
      return error.message ? `connection failed: ${error.message}` : 'connection failed';
    case 'parse_failure':
      return error.message ? `parse failure: ${error.message}` : 'parse failure';
    case 'blocked':
      return error.reason ? `blocked: ${error.reason}` : 'blocked';
  }
}
