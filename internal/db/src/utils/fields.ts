import { bigint, varchar } from "drizzle-orm/pg-core"

export const cuid = (name: string) => varchar(name, { length: 36 })

export const timestamps = {
  createdAtM: bigint("created_at_m", { mode: "number" })
    .notNull()
    .default(0)
    .$defaultFn(() => Date.now()),
  updatedAtM: bigint("updated_at_m", { mode: "number" })
    .notNull()
    .default(0)
    .$defaultFn(() => Date.now())
    .$onUpdateFn(() => Date.now()),
}
