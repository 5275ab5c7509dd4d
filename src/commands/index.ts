export { initCommand } from './init.js';
export { factsCommand } from './facts.js';
export { estimateCommand } from './estimate.js';
export { sensitivityCommand } from './sensitivity.js';
export { reportCommand } from './report.js';
export { doctorCommand } from './doctor.js';
