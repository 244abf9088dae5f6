export { BaseError } from "./base"
export { Ok, Err, wrap, type Result } from "./result"
export { SchemaError, FetchError } from "./errors"
