/**
 * Launches repository: last launch instant per application
 */

import type { LaunchRecord } from '@idlewipe/ipc';
import { BaseRepository } from '../base.repository';
import { LaunchCodec, LaunchRecordSchema } from './launches.schema';
import type { LaunchRecordInput } from './launches.schema';
import { mapLaunch } from './launches.model';
import { Q } from './launches.query';

export class LaunchesRepository extends BaseRepository {
  get(appId: string): LaunchRecord | null {
    const row = this.db.prepare(Q.selectByAppId).get({ app_id: appId });
    return row === undefined ? null : mapLaunch(row);
  }

  /** Insert or replace the record for `input.appId`. */
  upsert(input: LaunchRecordInput): LaunchRecord {
    const record = this.validate(LaunchRecordSchema, input);
    this.db.prepare(Q.upsert).run(LaunchCodec.encode(record));
    return record;
  }

  list(): LaunchRecord[] {
    return this.db.prepare(Q.selectAll).all().map(mapLaunch);
  }

  /** Returns true when a record was removed. */
  delete(appId: string): boolean {
    return this.db.prepare(Q.deleteByAppId).run({ app_id: appId }).changes > 0;
  }
}
