export { BindingAssignor, type ResourceBinding } from "./assignor";
export { Error, ErrorCode, ErrorMessages } from "./errors";
