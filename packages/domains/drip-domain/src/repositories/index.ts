export type { DripRepository } from './drip-repository.js';
export type { SentDripRepository } from './sent-drip-repository.js';
