export { delay, makeCounter } from './misc.ts';
export { makeSystemClock } from './clock.ts';
export type { Clock } from './clock.ts';
