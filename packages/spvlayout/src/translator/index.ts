/**
 * Translation of source types into interned target types
 */

export { Spv } from "./spv";
export { TypeTable } from "./type-table";
export { TranslationContext } from "./context";
export { TypeTranslator, type TranslateOptions } from "./translator";
export { ResourceShapeBuilder } from "./resources";
export { Error, ErrorCode, ErrorMessages } from "./errors";
