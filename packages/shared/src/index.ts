// Types
export type * from './types/route.js';
export type * from './types/navdata.js';
export type * from './types/plot.js';

// Utilities
export * from './utils/geo.js';
export * from './utils/route.js';
