/**
 * State Module - Public API
 */

export { StateCache, type ApplyResult } from './StateCache.mjs';
export {
  ButtonTracker,
  type ButtonTrackerOptions,
  type GestureCallback,
} from './ButtonTracker.mjs';
