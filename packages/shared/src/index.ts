export {
  AppError,
  NotFoundError,
  ValidationError,
  ConflictError,
  ServiceUnavailableError,
  isAppError,
} from './errors';
export { generateUlid, isValidUlid, ulidTimestamp, nowUTC } from './utils';
export { assertValidated, parseInput } from './validation';
