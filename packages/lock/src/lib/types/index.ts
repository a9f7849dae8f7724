// SPDX-License-Identifier: Apache-2.0

export { LockState } from './lock';
export type {
  LockAcquisition,
  LockHandle,
  LockStoreClient,
  LockStrategy,
  LockStrategyLabel,
  ScopedLockOptions,
} from './lock';
