export { scanCommand } from './scan.js';
export { configCommand } from './config.js';
