export * from './config.js';
export * from './driver.js';
export * from './summary.js';
