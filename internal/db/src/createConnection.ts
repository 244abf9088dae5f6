import { Pool, neonConfig } from "@neondatabase/serverless"
import type { Logger } from "drizzle-orm"
import { drizzle as drizzleNeon } from "drizzle-orm/neon-serverless"
import { withReplicas } from "drizzle-orm/pg-core"
import ws from "ws"
import type { Database } from "."
import * as schema from "./schema"

export type ConnectionDatabaseOptions = {
  env: "development" | "production" | "test"
  primaryDatabaseUrl: string
  read1DatabaseUrl?: string
  read2DatabaseUrl?: string
  logger: boolean
  singleton?: boolean
}

class QueryLogger implements Logger {
  logQuery(query: string, params?: unknown[]): void {
    console.info(`\x1b[36m[drizzle]\x1b[0m ${query}`)

    if (params && params.length > 0) {
      console.info(`params: ${JSON.stringify(params)}`)
    }
  }
}

neonConfig.webSocketConstructor = ws

let db: Database | null = null

export function createConnection(opts: ConnectionDatabaseOptions): Database {
  if (db && opts.singleton) {
    return db
  }

  if (opts.env === "development") {
    // local postgres behind the neon ws proxy
    neonConfig.wsProxy = (host) => `${host}:5433/v1?address=db:5432`
    neonConfig.useSecureWebSocket = false
    neonConfig.pipelineTLS = false
    neonConfig.pipelineConnect = false
  }

  const primary = drizzleNeon(
    new Pool({
      connectionString: opts.primaryDatabaseUrl,
      connectionTimeoutMillis: 30_000,
      idleTimeoutMillis: 30_000,
    }).on("error", (err) => {
      console.error("Database error:", err)
    }),
    {
      schema,
      logger: opts.logger ? new QueryLogger() : undefined,
    }
  )

  const replicas =
    opts.env === "production" && opts.read1DatabaseUrl && opts.read2DatabaseUrl
      ? [opts.read1DatabaseUrl, opts.read2DatabaseUrl].map((connectionString) =>
          drizzleNeon(new Pool({ connectionString }), { schema })
        )
      : []

  const [read1, read2] = replicas

  const connection =
    read1 && read2 ? withReplicas(primary, [read1, read2]) : withReplicas(primary, [primary])

  if (opts.singleton) {
    db = connection
  }

  return connection
}
