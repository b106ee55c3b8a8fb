export { generateUlid, isValidUlid, ulidTimestamp } from './ulid';
export { nowUTC } from './date';
