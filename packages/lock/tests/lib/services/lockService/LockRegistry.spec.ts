// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';
import { pino } from 'pino';

import { createLockConfig } from '../../../../src/lib/config/lockConfig';
import { LockConfigurationError } from '../../../../src/lib/errors/LockError';
import { LocalLockStrategy } from '../../../../src/lib/services/lockService/LocalLockStrategy';
import { LockRegistry } from '../../../../src/lib/services/lockService/LockRegistry';
import { overrideEnvsInMochaDescribe } from '../../../helpers';

describe('LockRegistry', () => {
  const logger = pino({ level: 'silent' });

  let registry: LockRegistry;

  beforeEach(() => {
    registry = new LockRegistry(logger);
  });

  it('should refuse a config that keeps the default collection', () => {
    expect(() => registry.register(createLockConfig())).to.throw(
      LockConfigurationError,
      'Cannot register a lock config that uses the default collection',
    );
    expect(registry.namespaces()).to.be.empty;
  });

  it('should refuse an invalid config', () => {
    const config = { ...createLockConfig({ collection: 'orders' }), databaseIndex: -1 };

    expect(() => registry.register(config)).to.throw(
      LockConfigurationError,
      'Lock database index must be a non-negative integer, got -1',
    );
  });

  it('should return the same service for the same namespace', () => {
    const strategy = new LocalLockStrategy(logger, 10);

    const first = registry.register(createLockConfig({ collection: 'orders' }), strategy);
    const second = registry.register(createLockConfig({ collection: 'orders' }), strategy);

    expect(second).to.equal(first);
    expect(registry.get(0, 'orders')).to.equal(first);
  });

  it('should keep one service per database index and collection', () => {
    const strategy = new LocalLockStrategy(logger, 10);

    const orders = registry.register(createLockConfig({ collection: 'orders' }), strategy);
    const invoices = registry.register(createLockConfig({ collection: 'invoices' }), strategy);
    const archived = registry.register(createLockConfig({ collection: 'orders', databaseIndex: 3 }), strategy);

    expect(orders).to.not.equal(invoices);
    expect(orders).to.not.equal(archived);
    expect(archived.config.databaseIndex).to.equal(3);
    expect(registry.get(1, 'orders')).to.be.undefined;
    expect(registry.namespaces()).to.deep.equal([
      { databaseIndex: 0, collection: 'orders' },
      { databaseIndex: 0, collection: 'invoices' },
      { databaseIndex: 3, collection: 'orders' },
    ]);
  });

  describe('without an explicit strategy', () => {
    overrideEnvsInMochaDescribe({ LOCK_BACKEND: 'local' });

    it('should create the configured strategy', async () => {
      const service = registry.register(createLockConfig({ collection: 'orders' }));

      expect(await service.withLock('order-42', (scope) => scope.key, { autoExtend: false })).to.equal(
        'orders.order-42',
      );
      expect(await service.health()).to.be.true;
    });
  });
});
