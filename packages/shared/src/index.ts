export * from './errors';
export * from './utils';
export { assertValidated, zodIssuesToDetails, describeZodError } from './validation';
