export * from './enums.js';
export * from './alert.js';
export * from './subscriber.js';
export * from './delivery-target.js';
export * from './dedup-record.js';
