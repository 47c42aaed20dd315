/**
 * Resource router for partlens
 *
 * Tracks worker health and load, and hands out request slots on the best
 * worker. The worker table is an immutable map replaced on every update, so
 * the selection path always reads one consistent snapshot of it.
 *
 * Selection score:
 *   wLoad / (1 + load) + wLatency / (1 + latency / latencyScaleMs) + wHealth * health
 * with health 1 for healthy and 0.5 for degraded. Near-equal scores rotate
 * round-robin.
 */

import { RouterConfigSchema, type RouterConfig } from '../config/schema.js';
import { getComponentLogger, logOperationError, type PartlensLogger } from '../logging/logger.js';
import {
  type HeartbeatMetrics,
  type HeartbeatProbe,
  type OutcomeReport,
  type StateTransition,
  type WorkerLease,
  type WorkerNode,
  type WorkerRegistration,
  type WorkerRequirements,
  type WorkerState,
  type WorkerStats,
  RouterError,
  RouterErrorCode,
} from './types.js';

const SCORE_EPSILON = 1e-9;

const HEALTH_WEIGHT: Record<WorkerState, number> = {
  registering: 0,
  healthy: 1,
  degraded: 0.5,
  unhealthy: 0,
  removed: 0,
};

interface Waiter {
  enqueuedAt: number;
  resolve: (lease: WorkerLease) => void;
  reject: (error: RouterError) => void;
  cleanup: () => void;
}

export interface ResourceRouterOptions {
  config?: RouterConfig;
  logger?: PartlensLogger;
  now?: () => number;
}

function isEligible(node: WorkerNode): boolean {
  return node.state === 'healthy' || node.state === 'degraded';
}

export class ResourceRouter {
  private readonly config: RouterConfig;
  private readonly logger: PartlensLogger;
  private readonly now: () => number;

  private table: ReadonlyMap<string, WorkerNode> = new Map();
  private readonly waiters = new Map<string, Waiter[]>();
  private roundRobin = 0;
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private heartbeatRound: Promise<void> | null = null;

  constructor(options: ResourceRouterOptions = {}) {
    this.config = options.config ?? RouterConfigSchema.parse({});
    this.logger = options.logger ?? getComponentLogger('router');
    this.now = options.now ?? Date.now;
  }

  /**
   * Add a worker in the `registering` state; it becomes eligible after its
   * first successful heartbeat
   */
  registerWorker(registration: WorkerRegistration): WorkerNode {
    if (this.table.has(registration.id)) {
      throw new RouterError(`Worker ${registration.id} is already registered`, RouterErrorCode.DUPLICATE_WORKER);
    }

    const node: WorkerNode = {
      id: registration.id,
      address: registration.address,
      state: 'registering',
      capacity: registration.capacity ?? this.config.capacity,
      capabilities: [...(registration.capabilities ?? [])],
      inFlight: 0,
      reportedLoad: undefined,
      latencyEwma: 0,
      latencySamples: 0,
      errorRateEwma: 0,
      outcomeSamples: 0,
      consecutiveBad: 0,
      consecutiveHeartbeatFailures: 0,
      successStreak: 0,
      observations: 0,
      lastHeartbeatAt: undefined,
      history: [],
    };

    this.replace(node);
    this.logger.info({ worker: node.id, capacity: node.capacity }, 'Worker registered');
    return node;
  }

  /**
   * Remove a worker; queued requests on it fail with NO_AVAILABLE_WORKER
   */
  deregisterWorker(id: string): boolean {
    const node = this.table.get(id);
    if (node === undefined) return false;

    this.transition(node, 'removed', 'deregistered');
    const next = new Map(this.table);
    next.delete(id);
    this.table = next;
    this.failWaiters(id, `Worker ${id} was removed`);
    return true;
  }

  getWorker(id: string): WorkerNode | undefined {
    return this.table.get(id);
  }

  getHistory(id: string): readonly StateTransition[] {
    return this.table.get(id)?.history ?? [];
  }

  /**
   * Apply one heartbeat observation
   */
  heartbeat(id: string, metrics: HeartbeatMetrics): WorkerNode {
    const node = this.requireWorker(id);
    const latencyMs = metrics.latencyMs;
    const slow = latencyMs !== undefined && latencyMs > this.config.slowLatencyMs;
    const success = metrics.ok && !slow;

    let next: WorkerNode = {
      ...node,
      observations: node.observations + 1,
      lastHeartbeatAt: this.now(),
      reportedLoad: metrics.load ?? node.reportedLoad,
      consecutiveHeartbeatFailures: metrics.ok ? 0 : node.consecutiveHeartbeatFailures + 1,
      consecutiveBad: success ? 0 : node.consecutiveBad + 1,
      successStreak: success ? node.successStreak + 1 : 0,
    };
    if (latencyMs !== undefined) {
      next = { ...next, ...this.updateLatency(next, latencyMs) };
    }
    this.replace(next);

    if (!metrics.ok && next.consecutiveHeartbeatFailures >= this.config.unhealthyAfter) {
      this.transition(next, 'unhealthy', `${next.consecutiveHeartbeatFailures} consecutive heartbeat failures`);
    } else if (next.state === 'registering' && success) {
      this.transition(next, 'healthy', 'first successful heartbeat');
    } else if (
      (next.state === 'unhealthy' || next.state === 'degraded') &&
      next.successStreak >= this.config.recoveryStreak
    ) {
      this.transition(next, 'healthy', `${next.successStreak} consecutive successful heartbeats`);
    } else if (next.state === 'healthy' && next.consecutiveBad >= this.config.degradeAfter) {
      this.transition(next, 'degraded', `${next.consecutiveBad} consecutive slow or failed observations`);
    }

    return this.requireWorker(id);
  }

  /**
   * Feed a request outcome into the latency and error-rate averages
   */
  reportOutcome(id: string, outcome: OutcomeReport): void {
    const node = this.table.get(id);
    if (node === undefined) return;

    const slow = outcome.latencyMs > this.config.slowLatencyMs;
    const alpha = this.config.ewmaAlpha;
    const next: WorkerNode = {
      ...node,
      ...this.updateLatency(node, outcome.latencyMs),
      observations: node.observations + 1,
      outcomeSamples: node.outcomeSamples + 1,
      errorRateEwma: alpha * (outcome.ok ? 0 : 1) + (1 - alpha) * node.errorRateEwma,
      consecutiveBad: outcome.ok && !slow ? 0 : node.consecutiveBad + 1,
    };
    this.replace(next);

    if (
      isEligible(next) &&
      next.outcomeSamples >= this.config.minErrorSamples &&
      next.errorRateEwma >= this.config.errorRateThreshold
    ) {
      this.transition(next, 'unhealthy', `error rate ${next.errorRateEwma.toFixed(2)}`);
    } else if (next.state === 'healthy' && next.consecutiveBad >= this.config.degradeAfter) {
      this.transition(next, 'degraded', `${next.consecutiveBad} consecutive slow or failed responses`);
    }
  }

  /**
   * Best eligible worker for the requirements, without taking a slot
   */
  selectWorker(requirements: WorkerRequirements = {}): WorkerNode {
    const candidates = this.eligible(requirements);
    const chosen = this.pickBest(candidates);
    if (chosen === undefined) {
      throw new RouterError('No healthy or degraded worker is available', RouterErrorCode.NO_AVAILABLE_WORKER);
    }
    return chosen;
  }

  /**
   * Take a request slot. Prefers workers with free capacity, queues on the
   * best worker with queue room otherwise, and fails fast with OVERLOAD when
   * every eligible queue is full.
   */
  acquire(requirements: WorkerRequirements = {}, signal?: AbortSignal): Promise<WorkerLease> {
    if (signal?.aborted === true) {
      return Promise.reject(new RouterError('Request aborted before routing', RouterErrorCode.ABORTED));
    }

    const candidates = this.eligible(requirements);
    if (candidates.length === 0) {
      return Promise.reject(
        new RouterError('No healthy or degraded worker is available', RouterErrorCode.NO_AVAILABLE_WORKER)
      );
    }

    const free = this.pickBest(candidates.filter((node) => node.inFlight < node.capacity));
    if (free !== undefined) {
      return Promise.resolve(this.grant(free.id, this.now()));
    }

    const queueable = candidates.filter((node) => this.queueLength(node.id) < this.config.queueLimit);
    const target = this.pickBest(queueable);
    if (target === undefined) {
      return Promise.reject(
        new RouterError('All eligible workers are at capacity with full queues', RouterErrorCode.OVERLOAD)
      );
    }

    return this.enqueue(target.id, signal);
  }

  getWorkerStats(): WorkerStats[] {
    return [...this.table.values()]
      .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
      .map((node) => ({
        id: node.id,
        state: node.state,
        load: this.loadOf(node),
        latencyEWMA: node.latencyEwma,
        errorRate: node.errorRateEwma,
        inFlight: node.inFlight,
        queued: this.queueLength(node.id),
        capacity: node.capacity,
      }));
  }

  /**
   * Probe every registered worker once
   */
  async runHeartbeatRound(probe: HeartbeatProbe): Promise<void> {
    const ids = [...this.table.keys()];
    await Promise.all(
      ids.map(async (id) => {
        let metrics: HeartbeatMetrics;
        const started = this.now();
        try {
          metrics = await probe(id, AbortSignal.timeout(this.config.heartbeatIntervalMs));
        } catch (error) {
          metrics = { ok: false, error: error instanceof Error ? error.message : String(error) };
        }
        metrics.latencyMs ??= this.now() - started;

        // the worker may have been deregistered while the probe ran
        if (this.table.has(id)) {
          this.heartbeat(id, metrics);
        }
      })
    );
  }

  /**
   * Probe workers every `heartbeatIntervalMs` until stop()
   */
  startHeartbeats(probe: HeartbeatProbe): void {
    if (this.heartbeatTimer !== null) return;

    this.heartbeatTimer = setInterval(() => {
      if (this.heartbeatRound !== null) return;
      this.heartbeatRound = this.runHeartbeatRound(probe)
        .catch((error: unknown) => {
          const err = error instanceof Error ? error : new Error(String(error));
          logOperationError(this.logger, 'heartbeatRound', err);
        })
        .finally(() => {
          this.heartbeatRound = null;
        });
    }, this.config.heartbeatIntervalMs);
    this.heartbeatTimer.unref();
  }

  stop(): void {
    if (this.heartbeatTimer !== null) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  /** Selection score of a node; exposed for diagnostics */
  scoreOf(node: WorkerNode): number {
    const { weights, latencyScaleMs } = this.config;
    return (
      weights.load / (1 + this.loadOf(node)) +
      weights.latency / (1 + node.latencyEwma / latencyScaleMs) +
      weights.health * HEALTH_WEIGHT[node.state]
    );
  }

  private loadOf(node: WorkerNode): number {
    const local = node.capacity > 0 ? node.inFlight / node.capacity : 1;
    return node.reportedLoad === undefined ? local : (local + node.reportedLoad) / 2;
  }

  private updateLatency(node: WorkerNode, latencyMs: number): Pick<WorkerNode, 'latencyEwma' | 'latencySamples'> {
    const alpha = this.config.ewmaAlpha;
    return {
      latencyEwma: node.latencySamples === 0 ? latencyMs : alpha * latencyMs + (1 - alpha) * node.latencyEwma,
      latencySamples: node.latencySamples + 1,
    };
  }

  private eligible(requirements: WorkerRequirements): WorkerNode[] {
    const excluded = new Set(requirements.exclude ?? []);
    const capability = requirements.capability;
    return [...this.table.values()].filter(
      (node) =>
        isEligible(node) &&
        !excluded.has(node.id) &&
        (capability === undefined || node.capabilities.includes(capability))
    );
  }

  private pickBest(nodes: WorkerNode[]): WorkerNode | undefined {
    if (nodes.length === 0) return undefined;

    const scored = nodes
      .map((node) => ({ node, score: this.scoreOf(node) }))
      .sort((a, b) => (a.node.id < b.node.id ? -1 : a.node.id > b.node.id ? 1 : 0));
    const best = Math.max(...scored.map((s) => s.score));
    const ties = scored.filter((s) => best - s.score <= SCORE_EPSILON);

    const chosen = ties[this.roundRobin % ties.length];
    this.roundRobin = (this.roundRobin + 1) % Number.MAX_SAFE_INTEGER;
    return chosen?.node;
  }

  private queueLength(id: string): number {
    return this.waiters.get(id)?.length ?? 0;
  }

  private requireWorker(id: string): WorkerNode {
    const node = this.table.get(id);
    if (node === undefined) {
      throw new RouterError(`Unknown worker ${id}`, RouterErrorCode.UNKNOWN_WORKER);
    }
    return node;
  }

  private replace(node: WorkerNode): void {
    this.table = new Map(this.table).set(node.id, node);
  }

  private transition(node: WorkerNode, to: WorkerState, reason: string): void {
    if (node.state === to) return;

    const record: StateTransition = {
      from: node.state,
      to,
      reason,
      sequence: node.observations,
      at: this.now(),
    };
    const history = [...node.history, record].slice(-this.config.historyLimit);
    this.replace({ ...node, state: to, history });

    this.logger.info({ worker: node.id, ...record }, `Worker ${node.id} ${record.from} -> ${to}`);

    if (to === 'unhealthy') {
      this.failWaiters(node.id, `Worker ${node.id} became unhealthy`);
    }
  }

  private grant(id: string, enqueuedAt: number): WorkerLease {
    const node = this.requireWorker(id);
    this.replace({ ...node, inFlight: node.inFlight + 1 });

    let released = false;
    return {
      workerId: id,
      queuedMs: this.now() - enqueuedAt,
      release: (outcome?: OutcomeReport) => {
        if (released) return;
        released = true;
        this.releaseSlot(id, outcome);
      },
    };
  }

  private releaseSlot(id: string, outcome: OutcomeReport | undefined): void {
    const node = this.table.get(id);
    if (node === undefined) return;

    this.replace({ ...node, inFlight: Math.max(0, node.inFlight - 1) });
    if (outcome !== undefined) {
      this.reportOutcome(id, outcome);
    }

    const current = this.table.get(id);
    if (current === undefined || !isEligible(current)) return;

    const queue = this.waiters.get(id);
    const waiter = queue?.shift();
    if (waiter === undefined) return;

    waiter.cleanup();
    waiter.resolve(this.grant(id, waiter.enqueuedAt));
  }

  private enqueue(id: string, signal: AbortSignal | undefined): Promise<WorkerLease> {
    return new Promise<WorkerLease>((resolve, reject) => {
      let queue = this.waiters.get(id);
      if (queue === undefined) {
        queue = [];
        this.waiters.set(id, queue);
      }

      const onAbort = (): void => {
        const pending = this.waiters.get(id);
        const index = pending?.indexOf(waiter) ?? -1;
        if (pending !== undefined && index >= 0) {
          pending.splice(index, 1);
        }
        reject(new RouterError('Request aborted while queued', RouterErrorCode.ABORTED));
      };

      const waiter: Waiter = {
        enqueuedAt: this.now(),
        resolve,
        reject,
        cleanup: () => signal?.removeEventListener('abort', onAbort),
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      queue.push(waiter);
    });
  }

  private failWaiters(id: string, message: string): void {
    const queue = this.waiters.get(id);
    if (queue === undefined) return;
    this.waiters.delete(id);
    for (const waiter of queue) {
      waiter.cleanup();
      waiter.reject(new RouterError(message, RouterErrorCode.NO_AVAILABLE_WORKER));
    }
  }
}
