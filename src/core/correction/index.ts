export { RationaleCorrector, getRationaleCorrector, buildPriorContext } from './service.js';
