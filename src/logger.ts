import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger };

/**
 * Logger used when the caller does not pass one. Libraries stay quiet unless asked.
 * @internal
 */
export const silentLogger: Logger = pino({ name: 'chaosmonkey', level: 'silent' });
