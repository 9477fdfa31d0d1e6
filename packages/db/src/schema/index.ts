export * from './occupancy';
export * from './financial';
export * from './locks';
