// Types
export type * from './types/quantities.js';
export type * from './types/aircraft.js';
export type * from './types/protocol.js';

// Utilities
export * from './utils/units.js';
