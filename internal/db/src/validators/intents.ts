import { createSelectSchema } from "drizzle-zod"
import type { z } from "zod"

import * as schema from "../schema"

export const intentRecordSelectSchema = createSelectSchema(schema.provisioningIntents)

export type IntentRecord = z.infer<typeof intentRecordSelectSchema>
