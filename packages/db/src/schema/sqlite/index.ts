export * from './occupancy';
export * from './financial';
