/**
 * Unit-level entry points
 */

export {
  layoutPass,
  type LayoutPass,
  type LayoutPassInput,
  type LayoutPassOutput,
} from "./layout-pass";
export { compile, type CompileOptions } from "./compile";
