// Drip Domain

// Entities
export * from './entities/index.js';

// Value Objects
export * from './value-objects/index.js';

// Errors
export * from './errors/index.js';

// Queryable port and in-memory adapter
export * from './queryable/index.js';

// Rule compilation
export * from './services/index.js';

// Repository Interfaces
export * from './repositories/index.js';

// Commands
export * from './commands/index.js';

// Application Services
export * from './application/index.js';
