export type { PeerRepository, PeerPatch } from "./repository"
export { MemoryPeerRepository } from "./providers/memory"
export { DrizzlePeerRepository } from "./providers/drizzle"
export { handleOf } from "./handle"
