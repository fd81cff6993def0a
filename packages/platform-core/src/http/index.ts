export { sendSuccess, sendCreated, sendAccepted } from './response-helpers.js';
export type { SuccessResponseBody } from './response-helpers.js';
export { validateInput, formatZodIssues, type FieldIssue } from './validation.js';
