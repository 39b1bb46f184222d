/**
 * Database row types (snake_case matching SQL columns)
 */

export interface DbLaunchRow {
  app_id: string;
  /** ISO-8601 instant; rows from older releases may lack a zone designator */
  last_launch_at: string;
}
