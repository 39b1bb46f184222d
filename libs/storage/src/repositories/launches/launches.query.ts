/**
 * Launch SQL queries
 */

const TABLE = 'launches';

export const Q = {
  selectByAppId: `SELECT app_id, last_launch_at FROM ${TABLE} WHERE app_id = @app_id`,

  selectAll: `SELECT app_id, last_launch_at FROM ${TABLE} ORDER BY app_id`,

  upsert: `
    INSERT INTO ${TABLE} (app_id, last_launch_at)
    VALUES (@app_id, @last_launch_at)
    ON CONFLICT(app_id) DO UPDATE SET last_launch_at = excluded.last_launch_at`,

  deleteByAppId: `DELETE FROM ${TABLE} WHERE app_id = @app_id`,
} as const;
