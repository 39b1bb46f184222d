export * from './clock';
export * from './config';
export * from './outcome';
export * from './result';
export * from './usage';
export * from './wipe';
