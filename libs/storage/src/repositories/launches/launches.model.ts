/**
 * Launch model: DB row mapper
 */

import type { LaunchRecord } from '@idlewipe/ipc';
import { StoreError } from '../../errors';
import { LaunchCodec } from './launches.schema';

// ---- Row mapper ----

export function mapLaunch(row: unknown): LaunchRecord {
  const decoded = LaunchCodec.safeParse(row);
  if (!decoded.success) {
    throw new StoreError(`Undecodable launch row: ${decoded.error.message}`, 'STORE_CORRUPT');
  }
  return decoded.data;
}
