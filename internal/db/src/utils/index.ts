export * from "./constants"
export { newId, randomId, getTimestampFromId, prefixes } from "./id"
export { pgTablePeerline } from "./_table"
export { cuid, timestamps } from "./fields"
