export * from './factory.js';
export * from './analysis.js';
export * from './printer.js';
