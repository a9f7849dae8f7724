// SPDX-License-Identifier: Apache-2.0

import { ConfigKey, isConfigKey } from './globalConfig';

export class LoggerService {
  public static readonly SENSITIVE_FIELDS: ConfigKey[] = ['LOCK_REDIS_PASSWORD'];

  public static readonly SECRET_NAME_PATTERN: RegExp = /(PASSWORD|SECRET|TOKEN)/;

  /**
   * Hide sensitive information
   *
   * @param envName
   * @param envValue
   */
  static maskUpEnv(envName: string, envValue: string | undefined): string {
    const isSensitiveField: boolean = isConfigKey(envName) && this.SENSITIVE_FIELDS.includes(envName);
    const isKnownSecret: boolean = envValue !== undefined && this.SECRET_NAME_PATTERN.test(envName);

    if (isSensitiveField || isKnownSecret) {
      return `${envName} = **********`;
    }

    return `${envName} = ${envValue}`;
  }
}
