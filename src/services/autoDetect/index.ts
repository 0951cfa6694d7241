export { detectAndParse, formatAll, formatOne } from './dispatcher.js';
export { AutoDetectSession } from './session.js';
export type { SessionState } from './session.js';
