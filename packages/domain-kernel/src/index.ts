export {
  ConflictError,
  DomainError,
  type ErrorBody,
  InvariantViolation,
  NotFoundError,
  ValidationError,
} from './errors/domain-error.js';
export { Result } from './result/result.js';
