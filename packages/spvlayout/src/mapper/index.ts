export {
  DeclMapper,
  GLOBALS_ID,
  type DeclInfo,
  type LayoutOutput,
} from "./mapper";
