import { pino, type Logger } from 'pino';

/** Default for library components that were not handed a logger. */
export const silentLogger: Logger = pino({ enabled: false });
