/**
 * Rule-based reply generation used in place of a language model
 */
export { generateReply, FIXED_REPLIES } from './generateReply.js';
export { summarize, reflect } from './textUtils.js';
