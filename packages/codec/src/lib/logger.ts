// SPDX-License-Identifier: Apache-2.0

import pino from 'pino';

import { ConfigService } from '../config/configService';

/**
 * Root logger of the codec. Modules log through `logger.child({ module })`.
 */
export const logger = pino({
  name: ConfigService.get('LOG_NAME'),
  level: ConfigService.get('LOG_LEVEL'),
});
