export { generateUlid, isValidUlid, generateUuid } from './ids';
export { isValidDate } from './date';
