// SPDX-License-Identifier: Apache-2.0

export { ConfigService } from './configService';
export type { ConfigValues } from './configService';
export { GlobalConfig, isConfigKey } from './globalConfig';
export type { ConfigKey, ConfigProperty, ConfigType } from './globalConfig';
export { LoggerService } from './loggerService';
