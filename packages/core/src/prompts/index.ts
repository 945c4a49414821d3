export type { Prompter } from './types.js';
