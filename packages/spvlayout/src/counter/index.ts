/**
 * Counter variables of append, consume and RW structured buffers
 */

export { CounterTracker, type CounterVariable } from "./tracker";
export {
  Association,
  type CounterHandle,
  type FieldPath,
} from "./association";
export { Error, ErrorCode, ErrorMessages } from "./errors";
