// SPDX-License-Identifier: Apache-2.0

import { Counter, Gauge, Histogram, Registry } from 'prom-client';

import { LockStrategyLabel } from '../../types';

export type LockAcquisitionStatus = 'success' | 'conflict';

/**
 * `lost` means the lease expired or changed hands while the scope was still open.
 */
export type LockExtensionStatus = 'success' | 'lost';

/**
 * `lost` means the lease was already gone when the scope exited.
 */
export type LockReleaseStatus = 'released' | 'lost';

const HOLD_DURATION_BUCKETS = [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30, 60, 300];

/**
 * Prometheus metrics of the lease lock lifecycle, labelled by strategy.
 *
 * Constructing a second instance on the same registry replaces the metrics of the first.
 */
export class LockMetricsService {
  static readonly METRIC_NAMES = {
    acquisitions: 'leaselock_acquisitions_total',
    extensions: 'leaselock_extensions_total',
    releases: 'leaselock_releases_total',
    holdDuration: 'leaselock_hold_duration_seconds',
    active: 'leaselock_active_count',
  } as const;

  private readonly acquisitions: Counter;
  private readonly extensions: Counter;
  private readonly releases: Counter;
  private readonly holdDuration: Histogram;
  private readonly active: Gauge;

  constructor(register: Registry) {
    const names = LockMetricsService.METRIC_NAMES;
    Object.values(names).forEach((name) => register.removeSingleMetric(name));

    this.acquisitions = new Counter({
      name: names.acquisitions,
      help: 'Lock acquisition attempts by outcome: success or conflict.',
      labelNames: ['strategy', 'status'],
      registers: [register],
    });
    this.extensions = new Counter({
      name: names.extensions,
      help: 'Lease renewals by outcome: success or lost.',
      labelNames: ['strategy', 'status'],
      registers: [register],
    });
    this.releases = new Counter({
      name: names.releases,
      help: 'Scope exits by outcome: released, or lost when the lease was already gone.',
      labelNames: ['strategy', 'status'],
      registers: [register],
    });
    this.holdDuration = new Histogram({
      name: names.holdDuration,
      help: 'Seconds between acquiring and releasing a lease.',
      labelNames: ['strategy'],
      buckets: HOLD_DURATION_BUCKETS,
      registers: [register],
    });
    this.active = new Gauge({
      name: names.active,
      help: 'Leases currently held by this process.',
      labelNames: ['strategy'],
      registers: [register],
    });
  }

  recordAcquisition(strategy: LockStrategyLabel, status: LockAcquisitionStatus): void {
    this.acquisitions.labels(strategy, status).inc();
  }

  recordExtension(strategy: LockStrategyLabel, status: LockExtensionStatus): void {
    this.extensions.labels(strategy, status).inc();
  }

  recordRelease(strategy: LockStrategyLabel, status: LockReleaseStatus): void {
    this.releases.labels(strategy, status).inc();
  }

  recordHoldDuration(strategy: LockStrategyLabel, seconds: number): void {
    this.holdDuration.labels(strategy).observe(seconds);
  }

  incrementActiveCount(strategy: LockStrategyLabel): void {
    this.active.labels(strategy).inc();
  }

  decrementActiveCount(strategy: LockStrategyLabel): void {
    this.active.labels(strategy).dec();
  }
}
