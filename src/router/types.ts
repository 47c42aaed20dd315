/**
 * Resource router types for partlens
 */

/**
 * Worker health states
 *
 * registering → healthy ⇄ degraded → unhealthy → removed, with recovery from
 * unhealthy to healthy after a streak of successful heartbeats.
 */
export type WorkerState = 'registering' | 'healthy' | 'degraded' | 'unhealthy' | 'removed';

export interface WorkerRegistration {
  id: string;
  address?: string;
  /** Concurrent requests before queueing (defaults to router config) */
  capacity?: number;
  capabilities?: string[];
}

export interface StateTransition {
  from: WorkerState;
  to: WorkerState;
  reason: string;
  /** Observation sequence number on the node when the transition happened */
  sequence: number;
  at: number;
}

/**
 * Immutable worker record held in the router table
 */
export interface WorkerNode {
  readonly id: string;
  readonly address: string | undefined;
  readonly state: WorkerState;
  readonly capacity: number;
  readonly capabilities: readonly string[];
  readonly inFlight: number;
  /** Load reported by the worker itself, 0..1 */
  readonly reportedLoad: number | undefined;
  readonly latencyEwma: number;
  readonly latencySamples: number;
  readonly errorRateEwma: number;
  readonly outcomeSamples: number;
  readonly consecutiveBad: number;
  readonly consecutiveHeartbeatFailures: number;
  readonly successStreak: number;
  readonly observations: number;
  readonly lastHeartbeatAt: number | undefined;
  readonly history: readonly StateTransition[];
}

export interface HeartbeatMetrics {
  ok: boolean;
  latencyMs?: number;
  /** Self-reported load, 0..1 */
  load?: number;
  error?: string;
}

export interface OutcomeReport {
  ok: boolean;
  latencyMs: number;
}

export interface WorkerRequirements {
  capability?: string;
  exclude?: readonly string[];
}

export interface WorkerStats {
  id: string;
  state: WorkerState;
  load: number;
  latencyEWMA: number;
  errorRate: number;
  inFlight: number;
  queued: number;
  capacity: number;
}

/**
 * A held request slot on a worker. Release exactly once.
 */
export interface WorkerLease {
  readonly workerId: string;
  /** Time spent waiting in the worker queue */
  readonly queuedMs: number;
  release(outcome?: OutcomeReport): void;
}

export type HeartbeatProbe = (workerId: string, signal: AbortSignal) => Promise<HeartbeatMetrics>;

/**
 * Router error codes
 */
export enum RouterErrorCode {
  /** Every eligible worker queue is full */
  OVERLOAD = 'OVERLOAD',
  /** No healthy or degraded worker matches */
  NO_AVAILABLE_WORKER = 'NO_AVAILABLE_WORKER',
  UNKNOWN_WORKER = 'UNKNOWN_WORKER',
  DUPLICATE_WORKER = 'DUPLICATE_WORKER',
  /** Caller gave up while queued */
  ABORTED = 'ABORTED',
}

/**
 * Router error
 */
export class RouterError extends Error {
  constructor(
    message: string,
    public readonly code: RouterErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'RouterError';
  }
}
