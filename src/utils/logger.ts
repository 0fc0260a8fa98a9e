import pino from 'pino';
import { Config } from '../config';

export type Logger = pino.Logger;

export function createLogger(options: Config['logging']): Logger {
  return pino({ name: 'ledger', level: options.level });
}
