import { createSelectSchema } from "drizzle-zod"
import type { z } from "zod"

import * as schema from "../schema"

export const divergenceFlagSelectSchema = createSelectSchema(schema.divergenceFlags)

export type DivergenceFlag = z.infer<typeof divergenceFlagSelectSchema>
