/**
 * Usage tracking types
 */

/** Last launch of one application; one record per application */
export interface LaunchRecord {
  appId: string;
  /** UTC instant */
  lastLaunchAt: Date;
}
