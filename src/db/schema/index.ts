export { alerts } from './alerts.js';
export { subscribers } from './subscribers.js';
export { deliveryTargets } from './delivery-targets.js';
export { dedupRecords } from './dedup-records.js';
