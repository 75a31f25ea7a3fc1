export { formatUnitStatus, reportStatus } from './reporter.js';
export { InMemoryStatusStore } from './store.js';
