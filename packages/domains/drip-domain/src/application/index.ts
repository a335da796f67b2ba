export { DripApplicationService } from './drip-service.js';
