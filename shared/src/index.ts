// Core types and enums for the advocacy packet engine
export * from './enums.js';
export * from './entities.js';
export * from './programs.js';
export * from './hazards.js';
export * from './awards.js';
export * from './economic.js';
export * from './packets.js';
export * from './regions.js';
export * from './api.js';
