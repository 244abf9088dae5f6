import { pgTableCreator } from "drizzle-orm/pg-core"

// every table lives under the same prefix so the schema can share a database
export const pgTablePeerline = pgTableCreator((name) => `peerline_${name}`)
