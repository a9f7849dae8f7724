// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@leaselock/config-service';
import { Logger, pino } from 'pino';

/**
 * Creates the root logger at the configured `LOG_LEVEL`.
 */
export function createLogger(name: string = 'leaselock'): Logger {
  return pino({ name, level: ConfigService.get('LOG_LEVEL') });
}
