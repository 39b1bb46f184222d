export { LaunchesRepository } from './launches.repository';
export { LaunchCodec, LaunchRecordSchema, LaunchRowSchema } from './launches.schema';
export type { LaunchRecordInput } from './launches.schema';
