export { PriceExecutionAdapter } from './price-execution.service.js';
