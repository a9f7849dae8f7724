// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';
import { Registry } from 'prom-client';

import { LockMetricsService } from '../../../../src/lib/services/lockService/LockMetricsService';
import { metricValue } from '../../../stubs';

describe('LockMetricsService', () => {
  let registry: Registry;
  let metrics: LockMetricsService;

  beforeEach(() => {
    registry = new Registry();
    metrics = new LockMetricsService(registry);
  });

  it('should count acquisitions per strategy and status', async () => {
    metrics.recordAcquisition('redis', 'success');
    metrics.recordAcquisition('redis', 'success');
    metrics.recordAcquisition('redis', 'conflict');
    metrics.recordAcquisition('local', 'success');

    expect(await metricValue(registry, 'leaselock_acquisitions_total', { strategy: 'redis', status: 'success' })).to.equal(2);
    expect(await metricValue(registry, 'leaselock_acquisitions_total', { strategy: 'redis', status: 'conflict' })).to.equal(1);
    expect(await metricValue(registry, 'leaselock_acquisitions_total', { strategy: 'local', status: 'success' })).to.equal(1);
    expect(await metricValue(registry, 'leaselock_acquisitions_total', { strategy: 'local', status: 'conflict' })).to.equal(0);
  });

  it('should count extensions and releases', async () => {
    metrics.recordExtension('redis', 'success');
    metrics.recordExtension('redis', 'lost');
    metrics.recordRelease('redis', 'released');
    metrics.recordRelease('redis', 'lost');
    metrics.recordRelease('redis', 'lost');

    expect(await metricValue(registry, 'leaselock_extensions_total', { strategy: 'redis', status: 'success' })).to.equal(1);
    expect(await metricValue(registry, 'leaselock_extensions_total', { strategy: 'redis', status: 'lost' })).to.equal(1);
    expect(await metricValue(registry, 'leaselock_releases_total', { strategy: 'redis', status: 'released' })).to.equal(1);
    expect(await metricValue(registry, 'leaselock_releases_total', { strategy: 'redis', status: 'lost' })).to.equal(2);
  });

  it('should track the number of held locks', async () => {
    metrics.incrementActiveCount('local');
    metrics.incrementActiveCount('local');
    metrics.decrementActiveCount('local');

    expect(await metricValue(registry, 'leaselock_active_count', { strategy: 'local' })).to.equal(1);
  });

  it('should observe hold durations', async () => {
    metrics.recordHoldDuration('local', 0.3);

    const output = await registry.getSingleMetricAsString('leaselock_hold_duration_seconds');

    expect(output).to.contain('leaselock_hold_duration_seconds_sum{strategy="local"} 0.3');
    expect(output).to.contain('leaselock_hold_duration_seconds_count{strategy="local"} 1');
  });

  it('should replace its metrics when created again on the same registry', async () => {
    metrics.recordAcquisition('redis', 'success');

    const recreated = new LockMetricsService(registry);
    recreated.recordAcquisition('redis', 'conflict');

    expect(await metricValue(registry, 'leaselock_acquisitions_total', { strategy: 'redis', status: 'success' })).to.equal(0);
    expect(await metricValue(registry, 'leaselock_acquisitions_total', { strategy: 'redis', status: 'conflict' })).to.equal(1);
  });
});
