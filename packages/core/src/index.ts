export * from './utils/bit.js';
export * from './shifter/exceptions.js';
export * from './shifter/shift_type.js';
export * from './shifter/shift.js';
export * from './shifter/expand_imm.js';
